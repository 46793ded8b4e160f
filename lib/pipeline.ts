/**
 * Сборка пайплайна: реестр → эмбеддинги → хранилище → индексатор / поиск
 */

import { COLLECTION_NAME, getDataPaths, getEmbeddingConfig, type DataPaths } from './config';
import { createEmbeddingClient } from './embedding-providers';
import type { EmbeddingClient } from './embeddings';
import { Indexer, loadDocumentsConfig, type IndexOptions, type IndexOutcome } from './indexer';
import { IndexManifestStore } from './manifest';
import type { PriorityBoostConfig } from './reranker';
import { Retriever } from './retriever';
import { SourceLock } from './source-lock';
import { loadRulingUrls, loadSourceRegistry } from './sources';
import type { IndexManifest, SourceRegistry } from './types';
import { JsonVectorStore, type VectorStore } from './vector-store';

export interface RagPipelineOptions {
  registry: SourceRegistry;
  rulingUrls: ReadonlyMap<string, string>;
  embeddings: EmbeddingClient;
  store: VectorStore;
  manifest: IndexManifestStore;
  collection?: string;
  boost?: PriorityBoostConfig;
  /** data/documents.json для indexAll */
  documentsFile?: string;
}

export interface RagStats {
  total_chunks: number;
  sources: Record<string, number>;
  index_state: IndexManifest;
  collection: string;
  embedding_model: string;
}

export interface RagPipeline {
  registry: SourceRegistry;
  indexer: Indexer;
  retriever: Retriever;
  indexAll(options?: IndexOptions & { sourceIds?: string[] }): Promise<IndexOutcome[]>;
  getStats(): Promise<RagStats>;
}

export function createRagPipeline(options: RagPipelineOptions): RagPipeline {
  const { registry, rulingUrls, embeddings, store, manifest, documentsFile } = options;
  const collection = options.collection ?? COLLECTION_NAME;

  // Один замок на индексатор и поиск
  const lock = new SourceLock();
  const indexer = new Indexer({ registry, embeddings, store, manifest, lock });
  const retriever = new Retriever({
    registry,
    rulingUrls,
    embeddings,
    store,
    lock,
    boost: options.boost,
  });

  return {
    registry,
    indexer,
    retriever,

    async indexAll(indexOptions = {}) {
      if (!documentsFile) {
        throw new Error('Не задан файл со списком документов (documentsFile)');
      }

      const { sourceIds, ...rest } = indexOptions;
      const documents = await loadDocumentsConfig(documentsFile);
      const selected = sourceIds
        ? documents.filter(doc => sourceIds.includes(doc.source_id))
        : documents;

      return indexer.indexAllDocuments(selected, rest);
    },

    async getStats() {
      const sources: Record<string, number> = {};
      for (const sourceId of registry.keys()) {
        const count = await store.count({ source: sourceId });
        if (count > 0) sources[sourceId] = count;
      }

      return {
        total_chunks: await store.count(),
        sources,
        index_state: await manifest.snapshot(),
        collection,
        embedding_model: embeddings.model,
      };
    },
  };
}

/**
 * Пайплайн из файлов в data/ (или RAG_DATA_DIR)
 */
export async function createRagPipelineFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  paths: DataPaths = getDataPaths(env)
): Promise<RagPipeline> {
  const [registry, rulingUrls] = await Promise.all([
    loadSourceRegistry(paths.sourcesFile),
    loadRulingUrls(paths.rulingsFile),
  ]);
  const embeddingConfig = getEmbeddingConfig(env);

  console.log(`[Pipeline] Провайдер: ${embeddingConfig.provider}, модель: ${embeddingConfig.model}`);

  return createRagPipeline({
    registry,
    rulingUrls,
    embeddings: createEmbeddingClient(embeddingConfig),
    store: new JsonVectorStore(paths.storeFile, COLLECTION_NAME),
    manifest: new IndexManifestStore(paths.manifestFile),
    documentsFile: paths.documentsFile,
  });
}

let pipelinePromise: Promise<RagPipeline> | null = null;

/**
 * Один пайплайн на процесс (route handlers Next.js)
 */
export function getRagPipeline(): Promise<RagPipeline> {
  if (!pipelinePromise) {
    pipelinePromise = createRagPipelineFromEnv().catch((error: unknown) => {
      pipelinePromise = null;
      throw error;
    });
  }
  return pipelinePromise;
}
