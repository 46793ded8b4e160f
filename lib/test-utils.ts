/**
 * Общие заглушки для тестов
 */

import type { EmbeddingClient } from './embeddings';
import { createSourceRegistry } from './sources';
import type { ChunkMetadata, SourceRegistry } from './types';

/**
 * Детерминированный вектор по символам текста
 */
export function hashVector(text: string, dimension = 16): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const char of text) {
    const code = char.codePointAt(0) ?? 0;
    vector[code % dimension] += 1;
  }
  return vector;
}

/**
 * Эмбеддинги без модели: заданные векторы или hashVector
 */
export class FakeEmbeddingClient implements EmbeddingClient {
  readonly model = 'fake-embedding';
  readonly dimension: number;
  readonly maxBatchSize: number;
  readonly calls: string[][] = [];
  /** Ошибка для всех вызовов, начиная с fromCall (с 1) */
  failure: { error: Error; fromCall: number } | null = null;
  private readonly vectors: Map<string, number[]>;

  constructor(vectors: Record<string, number[]> = {}, options: { dimension?: number; maxBatchSize?: number } = {}) {
    this.vectors = new Map(Object.entries(vectors));
    this.dimension = options.dimension ?? 16;
    this.maxBatchSize = options.maxBatchSize ?? 16;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedBatch([text]);
    return vector;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    if (this.failure && this.calls.length >= this.failure.fromCall) {
      throw this.failure.error;
    }
    return texts.map(text => this.vectors.get(text) ?? hashVector(text, this.dimension));
  }
}

/**
 * Промис, который тест разрешает вручную
 */
export function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

export const TEST_RULING_URLS: ReadonlyMap<string, string> = new Map([
  ['C-038', 'https://www.corteconstitucional.gov.co/relatoria/2020/C-038-20.htm'],
]);

export function createTestRegistry(): SourceRegistry {
  return createSourceRegistry([
    {
      id: 'codigo_transito',
      displayName: 'Ley 769 de 2002 (Código Nacional de Tránsito Terrestre)',
      shortName: 'Ley 769 de 2002',
      type: 'ley',
      priority: 1,
      year: 2002,
      url: 'https://www.funcionpublica.gov.co/eva/gestornormativo/norma.php?i=5557',
    },
    {
      id: 'jurisprudencia',
      displayName: 'Jurisprudencia de la Corte Constitucional',
      shortName: 'Jurisprudencia',
      type: 'jurisprudencia',
      priority: 2,
      year: 2024,
      url: 'https://www.corteconstitucional.gov.co/relatoria/',
    },
    {
      id: 'guia_conductor',
      displayName: 'Guía del conductor',
      type: 'guia',
      priority: 3,
      year: 2024,
      url: 'https://example.test/guia',
    },
    {
      id: 'compendio_normativo',
      displayName: 'Compendio Normativo de Tránsito',
      type: 'compendio',
      priority: 5,
      year: 2024,
    },
  ]);
}

export function chunkMetadata(source: string, overrides: Partial<ChunkMetadata> = {}): ChunkMetadata {
  return {
    source,
    sourceName: source,
    sourceType: 'unknown',
    sourcePriority: 5,
    chunkIndex: 0,
    chunkHash: '000000000000',
    indexedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}
