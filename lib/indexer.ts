/**
 * Индексация документов: чанкинг → метаданные → эмбеддинги → хранилище
 * Неизменённые файлы пропускаются по хэшу из манифеста.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { v5 as uuidv5 } from 'uuid';
import { z } from 'zod';
import { chunkDocument, type ChunkingConfig, type TextChunk } from './chunking';
import { CHUNK_OVERLAP, CHUNK_SIZE, INDEX_BATCH_SIZE } from './config';
import type { EmbeddingClient } from './embeddings';
import type { IndexManifestStore } from './manifest';
import { carryForward, EMPTY_CONTEXT, extractMetadata } from './metadata';
import { SourceLock } from './source-lock';
import { describeSource } from './sources';
import type { ChunkMetadata, DocumentConfig, SourceRegistry } from './types';
import type { VectorStore } from './vector-store';

// Пространство имён для детерминированных id чанков
const CHUNK_ID_NAMESPACE = '6f1c2b0e-3d4a-5b8c-9e7f-0a1b2c3d4e5f';

const DocumentsFileSchema = z.array(
  z.object({
    path: z.string().min(1),
    source_id: z.string().min(1),
  })
);

export type IndexStatus = 'indexed' | 'skipped' | 'not_found' | 'empty';

export interface IndexOutcome {
  status: IndexStatus;
  filePath: string;
  sourceId: string;
  chunkCount: number;
}

export interface IndexOptions {
  forceReindex?: boolean;
}

export interface IndexerDeps {
  registry: SourceRegistry;
  embeddings: EmbeddingClient;
  store: VectorStore;
  manifest: IndexManifestStore;
  lock?: SourceLock;
  chunking?: ChunkingConfig;
  batchSize?: number;
}

/**
 * Id чанка в хранилище: одинаковый текст одного источника → одинаковый id
 */
export function chunkId(sourceId: string, chunkHash: string): string {
  return uuidv5(`${sourceId}:${chunkHash}`, CHUNK_ID_NAMESPACE);
}

export function computeFileHash(content: Buffer): string {
  return createHash('md5').update(content).digest('hex');
}

export interface PreparedChunk {
  id: string;
  text: string;
  metadata: ChunkMetadata;
}

/**
 * Строит метаданные для чанков одного документа.
 * Статья / глава / раздел переносятся с предыдущих чанков, если в текущем их нет.
 */
export function buildChunkMetadata(
  chunks: TextChunk[],
  sourceId: string,
  registry: SourceRegistry,
  filePath?: string,
  indexedAt: string = new Date().toISOString()
): PreparedChunk[] {
  const source = describeSource(registry, sourceId);
  let context = EMPTY_CONTEXT;

  return chunks.map(chunk => {
    const carried = carryForward(context, extractMetadata(chunk.text));
    context = carried.context;

    return {
      id: chunkId(sourceId, chunk.hash),
      text: chunk.text,
      metadata: {
        source: sourceId,
        sourceName: source.displayName,
        sourceType: source.type,
        sourcePriority: source.priority,
        chunkIndex: chunk.index,
        chunkHash: chunk.hash,
        filePath,
        indexedAt,
        ...carried.metadata,
      },
    };
  });
}

/**
 * Один и тот же текст внутри документа храним один раз
 */
function dropDuplicateIds(chunks: PreparedChunk[]): PreparedChunk[] {
  const seen = new Set<string>();
  return chunks.filter(chunk => {
    if (seen.has(chunk.id)) return false;
    seen.add(chunk.id);
    return true;
  });
}

export class Indexer {
  private readonly registry: SourceRegistry;
  private readonly embeddings: EmbeddingClient;
  private readonly store: VectorStore;
  private readonly manifest: IndexManifestStore;
  private readonly lock: SourceLock;
  private readonly chunking: ChunkingConfig;
  private readonly batchSize: number;

  constructor(deps: IndexerDeps) {
    this.registry = deps.registry;
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.manifest = deps.manifest;
    this.lock = deps.lock ?? new SourceLock();
    this.chunking = deps.chunking ?? { chunkSize: CHUNK_SIZE, overlap: CHUNK_OVERLAP };
    // Батч для записи не больше лимита сервиса эмбеддингов
    this.batchSize = Math.min(deps.batchSize ?? INDEX_BATCH_SIZE, this.embeddings.maxBatchSize);
  }

  /**
   * Индексирует один документ
   * @returns Количество проиндексированных чанков (0 если файла нет)
   */
  async indexDocument(filePath: string, sourceId: string, forceReindex = false): Promise<number> {
    const outcome = await this.indexDocumentDetailed(filePath, sourceId, { forceReindex });
    return outcome.chunkCount;
  }

  /**
   * Индексирует один документ и сообщает, что именно произошло
   */
  async indexDocumentDetailed(
    filePath: string,
    sourceId: string,
    options: IndexOptions = {}
  ): Promise<IndexOutcome> {
    const resolvedPath = path.resolve(filePath);

    let content: Buffer;
    try {
      content = await fs.readFile(resolvedPath);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        console.error(`[Indexer] Файл не найден: ${resolvedPath}`);
        return { status: 'not_found', filePath: resolvedPath, sourceId, chunkCount: 0 };
      }
      throw error;
    }

    const fileHash = computeFileHash(content);
    const previous = await this.manifest.get(resolvedPath);

    if (!options.forceReindex && previous?.hash === fileHash) {
      console.log(`[Indexer] Документ уже проиндексирован (хэш совпадает): ${path.basename(resolvedPath)}`);
      return { status: 'skipped', filePath: resolvedPath, sourceId, chunkCount: previous.chunk_count };
    }

    const source = describeSource(this.registry, sourceId);
    if (!source.known) {
      console.warn(`[Indexer] Источник "${sourceId}" отсутствует в реестре, используем значения по умолчанию`);
    }

    console.log(
      `[Indexer] Индексация: ${path.basename(resolvedPath)} (источник: ${sourceId}, тип: ${source.type})`
    );

    const chunks = chunkDocument(content.toString('utf-8'), source.type, this.chunking);
    const prepared = dropDuplicateIds(buildChunkMetadata(chunks, sourceId, this.registry, resolvedPath));
    console.log(`[Indexer] Создано ${chunks.length} чанков (${prepared.length} уникальных)`);

    const chunkCount = await this.lock.runExclusive(sourceId, async () => {
      // Старая версия источника не должна смешиваться с новой
      const deleted = await this.store.delete({ source: sourceId });
      if (deleted > 0) {
        console.log(`[Indexer] Удалено ${deleted} старых чанков источника ${sourceId}`);
      }

      const totalBatches = Math.ceil(prepared.length / this.batchSize);
      let indexed = 0;

      for (let i = 0; i < prepared.length; i += this.batchSize) {
        const batch = prepared.slice(i, i + this.batchSize);
        console.log(`[Indexer] Эмбеддинги, батч ${i / this.batchSize + 1}/${totalBatches}...`);

        const vectors = await this.embeddings.embedBatch(batch.map(chunk => chunk.text));
        await this.store.upsert(
          batch.map(chunk => chunk.id),
          vectors,
          batch.map(chunk => chunk.text),
          batch.map(chunk => chunk.metadata)
        );
        indexed += batch.length;
      }

      return indexed;
    });

    // Манифест обновляем только после успешной записи всех батчей
    await this.manifest.set(resolvedPath, {
      hash: fileHash,
      source_id: sourceId,
      chunk_count: chunkCount,
      indexed_at: new Date().toISOString(),
    });
    await this.manifest.save();

    if (chunkCount === 0) {
      console.warn(`[Indexer] В документе ${path.basename(resolvedPath)} нет текста для индексации`);
      return { status: 'empty', filePath: resolvedPath, sourceId, chunkCount };
    }

    console.log(`[Indexer] Успешно проиндексировано ${chunkCount} чанков из ${path.basename(resolvedPath)}`);
    return { status: 'indexed', filePath: resolvedPath, sourceId, chunkCount };
  }

  /**
   * Индексирует список документов по очереди
   * @returns Результаты по каждому документу
   */
  async indexAllDocuments(
    documents: DocumentConfig[],
    options: IndexOptions = {}
  ): Promise<IndexOutcome[]> {
    const outcomes: IndexOutcome[] = [];

    for (const doc of documents) {
      outcomes.push(await this.indexDocumentDetailed(doc.path, doc.source_id, options));
    }

    const total = outcomes.reduce((sum, outcome) => sum + outcome.chunkCount, 0);
    console.log(`[Indexer] Всего проиндексировано: ${total} чанков из ${documents.length} документов`);
    return outcomes;
  }
}

/**
 * Читает data/documents.json; пути считаются относительно baseDir.
 * Отсутствующие файлы пропускаются.
 */
export async function loadDocumentsConfig(
  configFile: string,
  baseDir: string = path.dirname(configFile)
): Promise<DocumentConfig[]> {
  const raw = await fs.readFile(configFile, 'utf-8');
  const entries = DocumentsFileSchema.parse(JSON.parse(raw));

  const configs: DocumentConfig[] = [];
  for (const entry of entries) {
    const docPath = path.resolve(baseDir, entry.path);
    try {
      await fs.access(docPath);
      configs.push({ path: docPath, source_id: entry.source_id });
    } catch {
      console.warn(`[Indexer] Документ не найден (необязательный): ${entry.path}`);
    }
  }

  return configs;
}
