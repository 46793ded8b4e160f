/**
 * RAG (Retrieval-Augmented Generation) модуль
 * Собирает контекст для внешнего слоя генерации из найденных фрагментов норм
 */

import { formatCitation, type CitationContext } from './citations';
import { DEDUP_PREFIX_LENGTH, NO_RESULTS_MESSAGE } from './config';
import type { RetrievedResult } from './reranker';

export interface ContextOptions {
  includeReferences?: boolean;
  prefixLength?: number;
}

/**
 * Убирает почти одинаковые чанки (перекрытие соседних чанков):
 * результат пропускается, если его первые prefixLength символов уже встречались
 */
export function deduplicateByPrefix<T extends { text: string }>(
  results: T[],
  prefixLength: number = DEDUP_PREFIX_LENGTH
): T[] {
  const seen = new Set<string>();
  return results.filter(result => {
    const prefix = result.text.slice(0, prefixLength);
    if (seen.has(prefix)) return false;
    seen.add(prefix);
    return true;
  });
}

/**
 * Форматирует найденные чанки в контекст для LLM
 *
 * @param results - Результаты после бустинга, в порядке релевантности
 * @returns Текст контекста или сообщение об отсутствии результатов
 */
export function formatContext(
  results: RetrievedResult[],
  citations: CitationContext,
  options: ContextOptions = {}
): string {
  const { includeReferences = true, prefixLength = DEDUP_PREFIX_LENGTH } = options;
  const unique = deduplicateByPrefix(results, prefixLength);

  if (unique.length === 0) {
    return NO_RESULTS_MESSAGE;
  }

  if (unique.length < results.length) {
    console.log(`[RAG] Убрано дубликатов: ${results.length - unique.length}`);
  }

  const fragments = unique.map((result, index) => {
    const ordinal = index + 1;
    if (!includeReferences) {
      return `--- Fragmento ${ordinal} ---\n${result.text}`;
    }

    const relevance = Math.trunc(result.boosted_score * 100);
    const citation = formatCitation(result.metadata, citations);
    return `--- Fragmento ${ordinal} (Relevancia: ${relevance}%) ---\n${citation}\n\n${result.text}`;
  });

  const context = fragments.join('\n\n');
  console.log(`[RAG] Контекст: ${unique.length} фрагментов, ${context.length} символов`);
  return context;
}

export interface SourceSummary {
  source: string;
  source_name: string;
  chunks_used: number;
  avg_relevance: number;
  max_relevance: number;
}

/**
 * Сводка по источникам, использованным в контексте
 */
export function summarizeSources(results: RetrievedResult[]): SourceSummary[] {
  const bySource = new Map<string, RetrievedResult[]>();
  for (const result of results) {
    const group = bySource.get(result.source) ?? [];
    group.push(result);
    bySource.set(result.source, group);
  }

  return [...bySource.entries()].map(([source, chunks]) => {
    const scores = chunks.map(chunk => chunk.boosted_score);
    const avg = scores.reduce((sum, score) => sum + score, 0) / scores.length;

    return {
      source,
      source_name: chunks[0].metadata.sourceName,
      chunks_used: chunks.length,
      avg_relevance: parseFloat(avg.toFixed(4)),
      max_relevance: parseFloat(Math.max(...scores).toFixed(4)),
    };
  });
}

export type ContextQuality = 'high' | 'medium' | 'low' | 'none';

export interface ContextQualityReport {
  quality: ContextQuality;
  confidence: number;
  recommendation: string;
  avgScore: number;
  maxScore: number;
  totalChunks: number;
}

/**
 * Оценивает качество найденного контекста
 * Помогает понять, достаточно ли информации для ответа
 */
export function evaluateContextQuality(results: RetrievedResult[]): ContextQualityReport {
  if (results.length === 0) {
    return {
      quality: 'none',
      confidence: 0,
      recommendation: 'Релевантных норм не найдено. Ответ должен сообщить об отсутствии информации.',
      avgScore: 0,
      maxScore: 0,
      totalChunks: 0,
    };
  }

  const scores = results.map(r => r.boosted_score);
  const avgScore = scores.reduce((sum, score) => sum + score, 0) / scores.length;
  const maxScore = Math.max(...scores);

  let quality: ContextQuality;
  let confidence: number;
  let recommendation: string;

  if (maxScore > 0.7 && avgScore > 0.5) {
    quality = 'high';
    confidence = 0.9;
    recommendation = 'Найдены высокорелевантные нормы. Ответ будет точным.';
  } else if (maxScore > 0.5 && avgScore > 0.3) {
    quality = 'medium';
    confidence = 0.6;
    recommendation = 'Найдены частично релевантные нормы. Ответ может быть неполным.';
  } else {
    quality = 'low';
    confidence = 0.3;
    recommendation = 'Релевантность низкая. Уточните запрос.';
  }

  return {
    quality,
    confidence,
    recommendation,
    avgScore: parseFloat(avgScore.toFixed(4)),
    maxScore: parseFloat(maxScore.toFixed(4)),
    totalChunks: results.length,
  };
}
