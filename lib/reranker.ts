/**
 * Бустинг результатов по приоритету источника
 * Более авторитетные источники (меньший номер приоритета) поднимаются выше
 */

import { DEFAULT_SOURCE_PRIORITY } from './sources';
import type { SearchResult } from './similarity';

/**
 * Конфигурация бустинга
 */
export interface PriorityBoostConfig {
  // Приоритет без буста
  baselinePriority: number;

  // Прибавка к множителю за каждый уровень приоритета
  step: number;
}

export const DEFAULT_PRIORITY_BOOST: PriorityBoostConfig = {
  baselinePriority: DEFAULT_SOURCE_PRIORITY,
  step: 0.05,
};

/**
 * Результат после бустинга
 */
export interface RetrievedResult extends SearchResult {
  boosted_score: number;
  source_priority: number;
  original_rank: number; // позиция в выдаче хранилища, с 1
}

/**
 * boosted = similarity × (1 + (baseline − priority) × step)
 */
export function computeBoostedScore(
  similarity: number,
  priority: number,
  config: PriorityBoostConfig = DEFAULT_PRIORITY_BOOST
): number {
  return similarity * (1 + (config.baselinePriority - priority) * config.step);
}

/**
 * Применяет буст и сортирует по убыванию boosted_score.
 * Порядок результатов на входе - порядок хранилища; при равенстве он сохраняется.
 *
 * @param priorityOf - Приоритет источника результата
 */
export function boostResults(
  results: SearchResult[],
  priorityOf: (result: SearchResult) => number,
  config: PriorityBoostConfig = DEFAULT_PRIORITY_BOOST
): RetrievedResult[] {
  const boosted = results.map((result, index) => {
    const priority = priorityOf(result);
    return {
      ...result,
      boosted_score: computeBoostedScore(result.score, priority, config),
      source_priority: priority,
      original_rank: index + 1,
    };
  });

  // Array.prototype.sort стабилен
  return boosted.sort((a, b) => b.boosted_score - a.boosted_score);
}

/**
 * Получить топ-N результатов после бустинга
 */
export function getTopRanked(results: RetrievedResult[], topK: number): RetrievedResult[] {
  return results.slice(0, Math.max(0, topK));
}
