/**
 * Провайдер эмбеддингов: OpenAI embeddings API
 */

import OpenAI from 'openai';
import type { EmbeddingConfig } from './config';
import { BatchingEmbeddingClient, normalizeVector, type EmbeddingClient } from './embeddings';
import type { RetryConfig } from './retry';

/**
 * Часть OpenAI SDK, которая нужна клиенту (client.embeddings)
 */
export interface EmbeddingsApi {
  create(body: { model: string; input: string[] }): Promise<{
    data: Array<{ embedding: number[]; index: number }>;
  }>;
}

export class OpenAIEmbeddingClient extends BatchingEmbeddingClient {
  readonly model: string;
  readonly dimension: number;
  readonly maxBatchSize: number;
  private api: EmbeddingsApi;

  constructor(
    config: Pick<EmbeddingConfig, 'model' | 'dimension' | 'maxBatchSize' | 'apiKey'>,
    retryConfig?: Partial<RetryConfig>,
    api?: EmbeddingsApi
  ) {
    super(retryConfig);
    this.model = config.model;
    this.dimension = config.dimension;
    this.maxBatchSize = config.maxBatchSize;

    if (api) {
      this.api = api;
      return;
    }
    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY не найден в переменных окружения');
    }
    // Повторы делаем сами, чтобы политика была одна на весь пайплайн
    this.api = new OpenAI({ apiKey: config.apiKey, maxRetries: 0 }).embeddings;
  }

  protected async requestEmbeddings(texts: string[]): Promise<number[][]> {
    const response = await this.api.create({
      model: this.model,
      input: texts,
    });

    return [...response.data]
      .sort((a, b) => a.index - b.index)
      .map(item => normalizeVector(item.embedding));
  }
}

/**
 * Создаёт клиента для провайдера из конфигурации
 */
export function createEmbeddingClient(config: EmbeddingConfig): EmbeddingClient {
  switch (config.provider) {
    case 'openai':
      return new OpenAIEmbeddingClient(config);
  }
}
