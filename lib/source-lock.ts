/**
 * Блокировки по ключу (source_id).
 * Переиндексация источника (runExclusive) и чтение из него (runShared) не пересекаются.
 */

interface Reader {
  /** undefined - читает все источники */
  keys?: string[];
  done: Promise<void>;
}

export class SourceLock {
  private tails = new Map<string, Promise<void>>();
  private readers = new Set<Reader>();

  async runExclusive<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    // Читатели, начавшие до нас, должны закончить; новые ждут по tails
    const current = previous.then(() => this.readersDone(key)).then(fn);
    const tail = current.then(
      () => undefined,
      () => undefined
    );
    this.tails.set(key, tail);

    try {
      return await current;
    } finally {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /**
   * Выполняет fn, когда по ключам нет эксклюзивных операций, и не пускает новые до конца fn
   */
  async runShared<T>(keys: string[] | undefined, fn: () => Promise<T>): Promise<T> {
    // Между проверкой и регистрацией нет await
    while (this.hasPending(keys)) {
      await this.waitForIdle(keys);
    }

    let finish: () => void = () => undefined;
    const reader: Reader = {
      keys,
      done: new Promise<void>(resolve => {
        finish = resolve;
      }),
    };
    this.readers.add(reader);

    try {
      return await fn();
    } finally {
      this.readers.delete(reader);
      finish();
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }

  /**
   * Ждёт завершения текущих операций по ключам (по всем, если ключи не заданы)
   */
  async waitForIdle(keys?: string[]): Promise<void> {
    await Promise.all(this.pendingTails(keys));
  }

  private pendingTails(keys?: string[]): Promise<void>[] {
    if (!keys) return [...this.tails.values()];
    return keys.flatMap(key => {
      const tail = this.tails.get(key);
      return tail ? [tail] : [];
    });
  }

  private hasPending(keys?: string[]): boolean {
    return this.pendingTails(keys).length > 0;
  }

  private async readersDone(key: string): Promise<void> {
    const overlapping = [...this.readers].filter(reader => !reader.keys || reader.keys.includes(key));
    await Promise.all(overlapping.map(reader => reader.done));
  }
}
