import { EMBEDDING_RETRY_CONFIG } from './config';
import { EmbeddingServiceError, InvalidQueryError, errorMessage } from './errors';
import { withRetry, type RetryConfig } from './retry';

/**
 * Клиент сервиса эмбеддингов
 */
export interface EmbeddingClient {
  readonly model: string;
  readonly dimension: number;
  /** Максимум текстов в одном запросе к сервису */
  readonly maxBatchSize: number;
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

/**
 * Нормализует вектор (приводит к единичной длине)
 * Необходимо для корректного вычисления косинусного сходства
 */
export function normalizeVector(vector: number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  return magnitude > 0 ? vector.map(val => val / magnitude) : vector;
}

function assertNotEmpty(texts: string[]): void {
  if (texts.some(text => !text || text.trim().length === 0)) {
    throw new InvalidQueryError('Текст для эмбеддинга не может быть пустым');
  }
}

/**
 * Общая логика: разбиение на батчи по maxBatchSize и повторы при сбоях
 */
export abstract class BatchingEmbeddingClient implements EmbeddingClient {
  abstract readonly model: string;
  abstract readonly dimension: number;
  abstract readonly maxBatchSize: number;

  constructor(protected readonly retryConfig: Partial<RetryConfig> = EMBEDDING_RETRY_CONFIG) {}

  /** Один запрос к сервису, texts.length <= maxBatchSize */
  protected abstract requestEmbeddings(texts: string[]): Promise<number[][]>;

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];
    assertNotEmpty(texts);

    const embeddings: number[][] = [];
    for (let i = 0; i < texts.length; i += this.maxBatchSize) {
      const batch = texts.slice(i, i + this.maxBatchSize);

      try {
        const vectors = await withRetry(() => this.requestEmbeddings(batch), this.retryConfig);
        if (vectors.length !== batch.length) {
          throw new Error(`ожидалось ${batch.length} векторов, получено ${vectors.length}`);
        }
        embeddings.push(...vectors);
      } catch (error) {
        console.error('[Embeddings] Ошибка генерации эмбеддингов:', error);
        throw new EmbeddingServiceError(
          `Не удалось сгенерировать эмбеддинги (${this.model}): ${errorMessage(error)}`,
          { cause: error }
        );
      }
    }

    return embeddings;
  }
}
