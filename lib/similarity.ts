import type { ChunkMetadata } from './types';

/**
 * Вычисляет косинусное сходство между двумя векторами
 *
 * @param vec1 - Первый вектор
 * @param vec2 - Второй вектор
 * @returns Значение сходства от -1 до 1 (0 для нулевого вектора)
 */
export function cosineSimilarity(vec1: number[], vec2: number[]): number {
  if (vec1.length !== vec2.length) {
    throw new Error(
      `Векторы должны иметь одинаковую размерность (${vec1.length} != ${vec2.length})`
    );
  }

  let dotProduct = 0;
  let norm1 = 0;
  let norm2 = 0;
  for (let i = 0; i < vec1.length; i++) {
    dotProduct += vec1[i] * vec2[i];
    norm1 += vec1[i] * vec1[i];
    norm2 += vec2[i] * vec2[i];
  }

  if (norm1 === 0 || norm2 === 0) return 0;
  return dotProduct / (Math.sqrt(norm1) * Math.sqrt(norm2));
}

/**
 * Косинусное расстояние: 0 - одинаковое направление, 2 - противоположное
 */
export function cosineDistance(vec1: number[], vec2: number[]): number {
  return 1 - cosineSimilarity(vec1, vec2);
}

/**
 * Результат поиска с оценкой релевантности
 */
export interface SearchResult {
  id: string;
  text: string;
  source: string;
  score: number; // сходство 0-1, выше - ближе
  metadata: ChunkMetadata;
}

/**
 * Вычисляет статистику по результатам поиска
 */
export function getSearchStats(results: Array<{ score: number }>) {
  if (results.length === 0) {
    return {
      count: 0,
      avgScore: 0,
      maxScore: 0,
      minScore: 0,
    };
  }

  const scores = results.map(r => r.score);
  const sum = scores.reduce((a, b) => a + b, 0);

  return {
    count: results.length,
    avgScore: sum / results.length,
    maxScore: Math.max(...scores),
    minScore: Math.min(...scores),
  };
}
