/**
 * Манифест индексации: файл → хэш содержимого → количество чанков
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { StoreError, errorMessage } from './errors';
import type { IndexManifest, ManifestEntry } from './types';

const ManifestSchema = z.object({
  indexed_files: z.record(
    z.string(),
    z.object({
      hash: z.string(),
      source_id: z.string(),
      chunk_count: z.number().int().min(0),
      indexed_at: z.string(),
    })
  ),
  last_update: z.string().nullable(),
});

function emptyManifest(): IndexManifest {
  return { indexed_files: {}, last_update: null };
}

export class IndexManifestStore {
  private manifest: IndexManifest = emptyManifest();
  private loading: Promise<IndexManifest> | null = null;
  private saving: Promise<void> = Promise.resolve();
  private saveCounter = 0;

  /**
   * @param filePath - Путь к index_state.json; без него манифест только в памяти
   */
  constructor(private readonly filePath?: string) {}

  /**
   * Загружает манифест с диска один раз; параллельные вызовы ждут ту же загрузку.
   * Нечитаемый файл не фатален: начинаем заново.
   */
  load(): Promise<IndexManifest> {
    if (!this.loading) {
      this.loading = this.readFromDisk();
    }
    return this.loading;
  }

  private async readFromDisk(): Promise<IndexManifest> {
    if (!this.filePath) return this.manifest;

    try {
      const raw = await fs.readFile(this.filePath, 'utf-8');
      this.manifest = ManifestSchema.parse(JSON.parse(raw));
      console.log(
        `[Manifest] Загружено ${Object.keys(this.manifest.indexed_files).length} записей из ${this.filePath}`
      );
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        console.warn(`[Manifest] Не удалось загрузить состояние индекса: ${errorMessage(error)}`);
      }
      this.manifest = emptyManifest();
    }

    return this.manifest;
  }

  async get(filePath: string): Promise<ManifestEntry | undefined> {
    const manifest = await this.load();
    return manifest.indexed_files[filePath];
  }

  async set(filePath: string, entry: ManifestEntry): Promise<void> {
    const manifest = await this.load();
    manifest.indexed_files[filePath] = entry;
  }

  async snapshot(): Promise<IndexManifest> {
    const manifest = await this.load();
    return {
      indexed_files: { ...manifest.indexed_files },
      last_update: manifest.last_update,
    };
  }

  /**
   * Сохраняет манифест: временный файл + rename
   */
  save(): Promise<void> {
    const run = this.saving.then(() => this.writeToDisk());
    // Следующая запись ждёт эту, даже если она упала
    this.saving = run.catch(() => undefined);
    return run;
  }

  private async writeToDisk(): Promise<void> {
    const manifest = await this.load();
    manifest.last_update = new Date().toISOString();

    if (!this.filePath) return;

    const tmpPath = `${this.filePath}.${process.pid}.${++this.saveCounter}.tmp`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(manifest, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new StoreError(`Не удалось сохранить состояние индекса: ${errorMessage(error)}`, { cause: error });
    }
  }
}
