/**
 * Векторное хранилище чанков
 * JsonVectorStore держит записи в памяти и сохраняет их одним JSON файлом
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { COLLECTION_NAME } from './config';
import { StoreError, errorMessage } from './errors';
import { cosineDistance } from './similarity';
import type { ChunkMetadata } from './types';

export type MetadataValue = string | number;

/**
 * Точное совпадение поля метаданных; массив - совпадение с любым значением
 */
export type WhereFilter = Record<string, MetadataValue | MetadataValue[]>;

export interface VectorRecord {
  id: string;
  embedding: number[];
  text: string;
  metadata: ChunkMetadata;
}

export type StoredDocument = Omit<VectorRecord, 'embedding'>;

export interface QueryResult {
  ids: string[];
  documents: string[];
  distances: number[]; // косинусное расстояние, меньше - ближе
  metadatas: ChunkMetadata[];
}

export interface VectorStore {
  upsert(
    ids: string[],
    embeddings: number[][],
    documents: string[],
    metadatas: ChunkMetadata[]
  ): Promise<void>;
  query(embedding: number[], k: number, where?: WhereFilter): Promise<QueryResult>;
  /** Возвращает количество удалённых записей */
  delete(where: WhereFilter): Promise<number>;
  count(where?: WhereFilter): Promise<number>;
  get(where?: WhereFilter): Promise<StoredDocument[]>;
}

const ChunkMetadataSchema = z.object({
  source: z.string(),
  sourceName: z.string(),
  sourceType: z.enum([
    'ley', 'decreto', 'resolucion', 'jurisprudencia', 'guia',
    'constitucion', 'circular', 'compendio', 'referencia', 'manual', 'unknown',
  ]),
  sourcePriority: z.number(),
  chunkIndex: z.number().int(),
  chunkHash: z.string(),
  filePath: z.string().optional(),
  indexedAt: z.string(),
  article: z.string().optional(),
  chapter: z.string().optional(),
  title: z.string().optional(),
  sentencia: z.string().optional(),
  lawReference: z.string().optional(),
  decreeReference: z.string().optional(),
  section: z.string().optional(),
});

const StoreFileSchema = z.object({
  collection: z.string(),
  updated_at: z.string(),
  records: z.array(
    z.object({
      id: z.string(),
      embedding: z.array(z.number()),
      text: z.string(),
      metadata: ChunkMetadataSchema,
    })
  ),
});

/**
 * Проверяет метаданные на соответствие фильтру
 */
export function matchesFilter(metadata: ChunkMetadata, where?: WhereFilter): boolean {
  if (!where) return true;

  const values = new Map<string, unknown>(Object.entries(metadata));
  return Object.entries(where).every(([field, expected]) => {
    const actual = values.get(field);
    return Array.isArray(expected)
      ? expected.some(value => value === actual)
      : actual === expected;
  });
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Хранилище в памяти с сохранением в JSON файл.
 * Файл пишется во временный и переименовывается, поэтому всегда целый.
 */
export class JsonVectorStore implements VectorStore {
  private records = new Map<string, VectorRecord>();
  private loading: Promise<void> | null = null;
  private writing: Promise<void> = Promise.resolve();
  private writeCounter = 0;

  /**
   * @param filePath - Путь к JSON файлу; без него хранилище живёт только в памяти
   */
  constructor(
    private readonly filePath?: string,
    private readonly collection: string = COLLECTION_NAME
  ) {}

  private ensureLoaded(): Promise<void> {
    if (!this.loading) {
      this.loading = this.load();
    }
    return this.loading;
  }

  private async load(): Promise<void> {
    if (!this.filePath) return;

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        console.log(`[VectorStore] Файл ${this.filePath} не найден, начинаем с пустой коллекции`);
        return;
      }
      this.loading = null;
      throw new StoreError(`Не удалось прочитать хранилище ${this.filePath}: ${errorMessage(error)}`, { cause: error });
    }

    try {
      const data = StoreFileSchema.parse(JSON.parse(raw));
      for (const record of data.records) {
        this.records.set(record.id, record);
      }
      console.log(`[VectorStore] Загружено ${this.records.size} записей из ${this.filePath}`);
    } catch (error) {
      this.loading = null;
      throw new StoreError(`Хранилище ${this.filePath} повреждено: ${errorMessage(error)}`, { cause: error });
    }
  }

  private persist(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) return Promise.resolve();

    const snapshot = JSON.stringify({
      collection: this.collection,
      updated_at: new Date().toISOString(),
      records: [...this.records.values()],
    });
    const tmpPath = `${filePath}.${process.pid}.${++this.writeCounter}.tmp`;

    const write = this.writing.then(async () => {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      await fs.writeFile(tmpPath, snapshot, 'utf-8');
      await fs.rename(tmpPath, filePath);
    });
    // Следующая запись ждёт эту, даже если она упала
    this.writing = write.catch(() => undefined);

    return write.catch((error: unknown) => {
      throw new StoreError(`Не удалось сохранить хранилище ${filePath}: ${errorMessage(error)}`, { cause: error });
    });
  }

  async upsert(
    ids: string[],
    embeddings: number[][],
    documents: string[],
    metadatas: ChunkMetadata[]
  ): Promise<void> {
    if (
      embeddings.length !== ids.length ||
      documents.length !== ids.length ||
      metadatas.length !== ids.length
    ) {
      throw new StoreError('Длины ids, embeddings, documents и metadatas должны совпадать');
    }
    await this.ensureLoaded();

    ids.forEach((id, i) => {
      this.records.set(id, {
        id,
        embedding: embeddings[i],
        text: documents[i],
        metadata: metadatas[i],
      });
    });

    await this.persist();
  }

  async query(embedding: number[], k: number, where?: WhereFilter): Promise<QueryResult> {
    await this.ensureLoaded();

    const scored: Array<{ record: VectorRecord; distance: number }> = [];
    try {
      for (const record of this.records.values()) {
        if (!matchesFilter(record.metadata, where)) continue;
        scored.push({ record, distance: cosineDistance(embedding, record.embedding) });
      }
    } catch (error) {
      throw new StoreError(`Ошибка поиска в коллекции ${this.collection}: ${errorMessage(error)}`, { cause: error });
    }

    // sort стабилен: при равном расстоянии сохраняется порядок вставки
    const top = scored.sort((a, b) => a.distance - b.distance).slice(0, Math.max(0, k));

    return {
      ids: top.map(({ record }) => record.id),
      documents: top.map(({ record }) => record.text),
      distances: top.map(({ distance }) => distance),
      metadatas: top.map(({ record }) => record.metadata),
    };
  }

  async delete(where: WhereFilter): Promise<number> {
    await this.ensureLoaded();

    let deleted = 0;
    for (const [id, record] of this.records) {
      if (matchesFilter(record.metadata, where)) {
        this.records.delete(id);
        deleted++;
      }
    }

    if (deleted > 0) {
      await this.persist();
    }
    return deleted;
  }

  async count(where?: WhereFilter): Promise<number> {
    await this.ensureLoaded();
    if (!where) return this.records.size;

    let total = 0;
    for (const record of this.records.values()) {
      if (matchesFilter(record.metadata, where)) total++;
    }
    return total;
  }

  async get(where?: WhereFilter): Promise<StoredDocument[]> {
    await this.ensureLoaded();
    return [...this.records.values()]
      .filter(record => matchesFilter(record.metadata, where))
      .map(({ id, text, metadata }) => ({ id, text, metadata }));
  }
}
