import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse, validationErrorResponse } from '@/lib/api-errors';
import { formatCitation } from '@/lib/citations';
import { DEFAULT_N_RESULTS } from '@/lib/config';
import { getRagPipeline } from '@/lib/pipeline';
import { getSearchStats } from '@/lib/similarity';

const SearchRequestSchema = z.object({
  query: z.string().trim().min(1, 'Параметр "query" обязателен и должен быть непустой строкой'),
  n_results: z.number().int().min(1).max(50).optional().default(DEFAULT_N_RESULTS),
  source_filter: z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]).optional(),
  min_relevance: z.number().min(0).max(1).optional().default(0),
});

/**
 * POST /api/search
 * Семантический поиск по нормам с бустом по приоритету источника
 *
 * Body: {
 *   query: string,                      // Поисковый запрос
 *   n_results?: number,                 // Количество результатов (по умолчанию 5)
 *   source_filter?: string | string[],  // Ограничить источниками
 *   min_relevance?: number              // Минимальное сходство (по умолчанию 0)
 * }
 */
export async function POST(request: NextRequest) {
  const startTime = Date.now();

  try {
    const body: unknown = await request.json();
    const parsed = SearchRequestSchema.safeParse(body);
    if (!parsed.success) {
      return validationErrorResponse(parsed.error);
    }
    const { query, n_results, source_filter, min_relevance } = parsed.data;

    console.log(`[API Search] Запрос: "${query}" (n_results=${n_results}, min_relevance=${min_relevance})`);

    const pipeline = await getRagPipeline();
    const results = await pipeline.retriever.retrieve(query, n_results, {
      sourceFilter: source_filter,
      minRelevance: min_relevance,
    });

    const stats = getSearchStats(results);
    const duration = ((Date.now() - startTime) / 1000).toFixed(3);
    const citations = pipeline.retriever.citationContext;

    console.log(`[API Search] Найдено ${results.length} результатов за ${duration}s`);

    return NextResponse.json({
      success: true,
      query,
      results: results.map(r => ({
        id: r.id,
        text: r.text,
        source: r.source,
        score: parseFloat(r.score.toFixed(4)),
        boosted_score: parseFloat(r.boosted_score.toFixed(4)),
        source_priority: r.source_priority,
        original_rank: r.original_rank,
        citation: formatCitation(r.metadata, citations),
        metadata: r.metadata,
      })),
      stats: {
        total_results: results.length,
        avg_score: parseFloat(stats.avgScore.toFixed(4)),
        max_score: parseFloat(stats.maxScore.toFixed(4)),
        min_score: parseFloat(stats.minScore.toFixed(4)),
        duration_seconds: parseFloat(duration),
      },
    });
  } catch (error) {
    console.error('[API Search] Ошибка поиска:', error);
    if (error instanceof SyntaxError) {
      return NextResponse.json({ error: 'Тело запроса не является JSON', details: error.message }, { status: 400 });
    }
    return errorResponse(error, 'Ошибка при выполнении поиска');
  }
}

/**
 * GET /api/search
 * Возвращает информацию о доступных параметрах поиска
 */
export async function GET() {
  return NextResponse.json({
    endpoint: '/api/search',
    method: 'POST',
    description: 'Семантический поиск по нормам дорожного движения Колумбии',
    parameters: {
      query: {
        type: 'string',
        required: true,
        description: 'Текст поискового запроса',
      },
      n_results: {
        type: 'number',
        required: false,
        default: DEFAULT_N_RESULTS,
        min: 1,
        max: 50,
        description: 'Количество возвращаемых результатов',
      },
      source_filter: {
        type: 'string | string[]',
        required: false,
        description: 'Идентификаторы источников (например, codigo_transito)',
      },
      min_relevance: {
        type: 'number',
        required: false,
        default: 0,
        min: 0,
        max: 1,
        description: 'Минимальное сходство до буста по приоритету',
      },
    },
    example: {
      query: '¿Cuál es la multa por no usar casco?',
      n_results: 5,
    },
  });
}
