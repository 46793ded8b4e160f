/**
 * Конфигурация RAG пайплайна
 *
 * Провайдер эмбеддингов: openai (text-embedding-3-small, нужен OPENAI_API_KEY)
 */

import path from 'path';
import type { RetryConfig } from './retry';

// Провайдер по умолчанию
export const DEFAULT_EMBEDDING_PROVIDER = 'openai';

export const COLLECTION_NAME = 'transito_colombia';

// ============================================
// Chunking (длина в символах, string.length)
// ============================================
export const CHUNK_SIZE = 1000;
export const CHUNK_OVERLAP = 200;

// Сколько чанков документа пишется в хранилище за один раз
export const INDEX_BATCH_SIZE = 50;

// ============================================
// Retrieval
// ============================================
export const DEFAULT_N_RESULTS = 5;
export const OVERFETCH_FACTOR = 2;
export const DEDUP_PREFIX_LENGTH = 100;

export const NO_RESULTS_MESSAGE =
  'No se encontraron artículos o normas relevantes en la base de datos.';

// ============================================
// Embedding провайдеры
// ============================================
export const EMBEDDING_PROVIDERS = {
  openai: {
    name: 'OpenAI',
    defaultModel: 'text-embedding-3-small',
    dimension: 1536,
    maxBatchSize: 100,
  },
};

export type EmbeddingProvider = keyof typeof EMBEDDING_PROVIDERS;

export interface EmbeddingConfig {
  provider: EmbeddingProvider;
  model: string;
  dimension: number;
  maxBatchSize: number;
  apiKey?: string;
}

/**
 * Повторы при сбоях сервиса эмбеддингов: 500ms → 1s → 2s (макс. 8s), ±10%
 */
export const EMBEDDING_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitterFactor: 0.1,
  backoffMultiplier: 2,
};

function isEmbeddingProvider(value: string): value is EmbeddingProvider {
  return Object.hasOwn(EMBEDDING_PROVIDERS, value);
}

/**
 * Получить конфигурацию провайдера эмбеддингов
 */
export function getEmbeddingConfig(env: NodeJS.ProcessEnv = process.env): EmbeddingConfig {
  const provider = env.EMBEDDING_PROVIDER || DEFAULT_EMBEDDING_PROVIDER;

  if (!isEmbeddingProvider(provider)) {
    throw new Error(`Неизвестный провайдер эмбеддингов: ${provider}`);
  }

  const defaults = EMBEDDING_PROVIDERS[provider];
  const envModel = env.EMBEDDING_MODEL;
  if (envModel) {
    console.log(`[Config] Используется модель эмбеддингов из .env: ${envModel}`);
  }

  return {
    provider,
    model: envModel || defaults.defaultModel,
    dimension: defaults.dimension,
    maxBatchSize: defaults.maxBatchSize,
    apiKey: env.OPENAI_API_KEY,
  };
}

export interface DataPaths {
  dataDir: string;
  sourcesFile: string;
  rulingsFile: string;
  documentsFile: string;
  storeFile: string;
  manifestFile: string;
}

/**
 * Пути к данным: RAG_DATA_DIR или ./data
 */
export function getDataPaths(env: NodeJS.ProcessEnv = process.env): DataPaths {
  const dataDir = env.RAG_DATA_DIR
    ? path.resolve(env.RAG_DATA_DIR)
    : path.join(process.cwd(), 'data');

  return {
    dataDir,
    sourcesFile: path.join(dataDir, 'sources.json'),
    rulingsFile: path.join(dataDir, 'sentencias.json'),
    documentsFile: path.join(dataDir, 'documents.json'),
    storeFile: path.join(dataDir, 'vector_store.json'),
    manifestFile: path.join(dataDir, 'index_state.json'),
  };
}
