/**
 * Поиск релевантных фрагментов норм по запросу
 */

import type { CitationContext } from './citations';
import {
  DEDUP_PREFIX_LENGTH,
  DEFAULT_N_RESULTS,
  NO_RESULTS_MESSAGE,
  OVERFETCH_FACTOR,
} from './config';
import type { EmbeddingClient } from './embeddings';
import { InvalidQueryError, errorMessage } from './errors';
import { formatContext } from './rag';
import {
  boostResults,
  DEFAULT_PRIORITY_BOOST,
  getTopRanked,
  type PriorityBoostConfig,
  type RetrievedResult,
} from './reranker';
import type { SearchResult } from './similarity';
import { SourceLock } from './source-lock';
import type { SourceRegistry } from './types';
import type { VectorStore, WhereFilter } from './vector-store';

export interface RetrieveOptions {
  /** Один source_id или несколько */
  sourceFilter?: string | string[];
  /** Минимальное сходство до буста */
  minRelevance?: number;
}

export interface RetrieverDeps {
  registry: SourceRegistry;
  rulingUrls: ReadonlyMap<string, string>;
  embeddings: EmbeddingClient;
  store: VectorStore;
  lock?: SourceLock;
  boost?: PriorityBoostConfig;
}

export class Retriever {
  private readonly registry: SourceRegistry;
  private readonly embeddings: EmbeddingClient;
  private readonly store: VectorStore;
  private readonly lock: SourceLock;
  private readonly boost: PriorityBoostConfig;
  private readonly citations: CitationContext;

  constructor(deps: RetrieverDeps) {
    this.registry = deps.registry;
    this.embeddings = deps.embeddings;
    this.store = deps.store;
    this.lock = deps.lock ?? new SourceLock();
    this.boost = deps.boost ?? DEFAULT_PRIORITY_BOOST;
    this.citations = { registry: deps.registry, rulingUrls: deps.rulingUrls };
  }

  get citationContext(): CitationContext {
    return this.citations;
  }

  private priorityOf(result: SearchResult): number {
    // Неизвестный источник уже записан с приоритетом по умолчанию
    return this.registry.get(result.source)?.priority ?? result.metadata.sourcePriority;
  }

  /**
   * Ищет фрагменты, ранжированные по сходству с учётом приоритета источника
   */
  async retrieve(
    query: string,
    nResults: number = DEFAULT_N_RESULTS,
    options: RetrieveOptions = {}
  ): Promise<RetrievedResult[]> {
    if (!query || query.trim().length === 0) {
      throw new InvalidQueryError('Запрос не может быть пустым');
    }
    if (!Number.isInteger(nResults) || nResults < 1) {
      throw new InvalidQueryError(`n_results должен быть положительным целым числом (получено ${nResults})`);
    }

    const { sourceFilter, minRelevance = 0 } = options;
    if (!(minRelevance >= 0 && minRelevance <= 1)) {
      throw new InvalidQueryError(`min_relevance должен быть в диапазоне [0, 1] (получено ${minRelevance})`);
    }

    // Пустой список источников - без фильтра
    const requested = sourceFilter === undefined ? [] : Array.isArray(sourceFilter) ? sourceFilter : [sourceFilter];
    const sources = requested.length > 0 ? requested : undefined;
    const where: WhereFilter | undefined = sources ? { source: sources } : undefined;

    console.log(`[Retriever] Запрос: "${query.slice(0, 80)}" (n=${nResults})`);

    const queryEmbedding = await this.embeddings.embed(query);
    // Не читаем источник посреди переиндексации
    const raw = await this.lock.runShared(sources, () =>
      this.store.query(queryEmbedding, nResults * OVERFETCH_FACTOR, where)
    );

    const candidates: SearchResult[] = [];
    raw.ids.forEach((id, i) => {
      const score = 1 - raw.distances[i];
      if (score < minRelevance) return;
      candidates.push({
        id,
        text: raw.documents[i],
        source: raw.metadatas[i].source,
        score,
        metadata: raw.metadatas[i],
      });
    });

    const ranked = getTopRanked(
      boostResults(candidates, result => this.priorityOf(result), this.boost),
      nResults
    );

    console.log(
      `[Retriever] Найдено ${raw.ids.length}, после фильтра ${candidates.length}, возвращено ${ranked.length}`
    );
    return ranked;
  }

  /**
   * Контекст для генерации ответа.
   * Сбой поиска не прерывает диалог: возвращается сообщение об отсутствии результатов.
   */
  async getContextForQuery(
    query: string,
    nResults: number = DEFAULT_N_RESULTS,
    includeReferences = true
  ): Promise<string> {
    let results: RetrievedResult[];
    try {
      results = await this.retrieve(query, nResults);
    } catch (error) {
      if (error instanceof InvalidQueryError) throw error;
      console.error(`[Retriever] Ошибка поиска: ${errorMessage(error)}`);
      return NO_RESULTS_MESSAGE;
    }

    return formatContext(results, this.citations, {
      includeReferences,
      prefixLength: DEDUP_PREFIX_LENGTH,
    });
  }
}
