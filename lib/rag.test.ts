import { describe, expect, it } from 'vitest';
import { NO_RESULTS_MESSAGE } from './config';
import { deduplicateByPrefix, evaluateContextQuality, formatContext, summarizeSources } from './rag';
import type { RetrievedResult } from './reranker';
import { chunkMetadata, createTestRegistry, TEST_RULING_URLS } from './test-utils';

const citations = { registry: createTestRegistry(), rulingUrls: TEST_RULING_URLS };

function retrieved(id: string, source: string, boosted: number, text = id): RetrievedResult {
  return {
    id,
    text,
    source,
    score: boosted,
    boosted_score: boosted,
    source_priority: 5,
    original_rank: 1,
    metadata: chunkMetadata(source, { sourceName: `Fuente ${source}` }),
  };
}

describe('deduplicateByPrefix', () => {
  it('keeps the first result for each prefix', () => {
    const results = [{ text: 'abcdef' }, { text: 'abcxyz' }, { text: 'xyz' }];

    expect(deduplicateByPrefix(results, 3)).toEqual([{ text: 'abcdef' }, { text: 'xyz' }]);
  });
});

describe('formatContext', () => {
  it('returns the no-results message for an empty list', () => {
    expect(formatContext([], citations)).toBe(NO_RESULTS_MESSAGE);
  });

  it('numbers fragments consecutively and truncates the percentage', () => {
    const context = formatContext(
      [retrieved('uno', 'compendio_normativo', 0.876), retrieved('dos', 'compendio_normativo', 0.5)],
      citations
    );

    expect(context).toBe(
      '--- Fragmento 1 (Relevancia: 87%) ---\nCompendio Normativo de Tránsito\n\nuno\n\n' +
        '--- Fragmento 2 (Relevancia: 50%) ---\nCompendio Normativo de Tránsito\n\ndos'
    );
  });

  it('omits relevance and citation without references', () => {
    expect(formatContext([retrieved('uno', 'compendio_normativo', 0.9)], citations, { includeReferences: false })).toBe(
      '--- Fragmento 1 ---\nuno'
    );
  });
});

describe('summarizeSources', () => {
  it('groups results by source', () => {
    const summary = summarizeSources([
      retrieved('a', 'codigo_transito', 0.9),
      retrieved('b', 'guia_conductor', 0.6),
      retrieved('c', 'codigo_transito', 0.7),
    ]);

    expect(summary).toEqual([
      {
        source: 'codigo_transito',
        source_name: 'Fuente codigo_transito',
        chunks_used: 2,
        avg_relevance: 0.8,
        max_relevance: 0.9,
      },
      {
        source: 'guia_conductor',
        source_name: 'Fuente guia_conductor',
        chunks_used: 1,
        avg_relevance: 0.6,
        max_relevance: 0.6,
      },
    ]);
  });
});

describe('evaluateContextQuality', () => {
  it('reports no context for an empty result set', () => {
    expect(evaluateContextQuality([]).quality).toBe('none');
  });

  it('grades by boosted relevance', () => {
    expect(evaluateContextQuality([retrieved('a', 'ley', 0.9), retrieved('b', 'ley', 0.6)]).quality).toBe('high');
    expect(evaluateContextQuality([retrieved('a', 'ley', 0.6), retrieved('b', 'ley', 0.4)]).quality).toBe('medium');
    expect(evaluateContextQuality([retrieved('a', 'ley', 0.4)]).quality).toBe('low');
  });

  it('rounds the reported scores', () => {
    const report = evaluateContextQuality([retrieved('a', 'ley', 0.123456), retrieved('b', 'ley', 0.2)]);

    expect(report.maxScore).toBe(0.2);
    expect(report.avgScore).toBe(0.1617);
    expect(report.totalChunks).toBe(2);
  });
});
