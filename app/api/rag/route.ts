import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse, validationErrorResponse } from '@/lib/api-errors';
import { formatCitationLink } from '@/lib/citations';
import { DEFAULT_N_RESULTS, NO_RESULTS_MESSAGE } from '@/lib/config';
import { InvalidQueryError, errorMessage } from '@/lib/errors';
import { getRagPipeline } from '@/lib/pipeline';
import { evaluateContextQuality, formatContext, summarizeSources } from '@/lib/rag';
import type { RetrievedResult } from '@/lib/reranker';

const RagRequestSchema = z.object({
  query: z.string().trim().min(1, 'Параметр "query" обязателен и должен быть непустой строкой'),
  n_results: z.number().int().min(1).max(20).optional().default(DEFAULT_N_RESULTS),
  include_references: z.boolean().optional().default(true),
});

/**
 * POST /api/rag
 * Контекст для слоя генерации: вопрос → поиск → фрагменты со ссылками
 *
 * Body: {
 *   query: string,                 // Вопрос пользователя
 *   n_results?: number,            // Количество фрагментов (по умолчанию 5)
 *   include_references?: boolean   // Добавлять ссылки на нормы (по умолчанию true)
 * }
 */
export async function POST(request: NextRequest) {
  const startTime = Date.now();

  try {
    const body: unknown = await request.json();
    const parsed = RagRequestSchema.safeParse(body);
    if (!parsed.success) {
      return validationErrorResponse(parsed.error);
    }
    const { query, n_results, include_references } = parsed.data;

    console.log(`[API RAG] Запрос: "${query.substring(0, 50)}..." (n_results=${n_results})`);

    const pipeline = await getRagPipeline();
    const { retriever } = pipeline;

    let results: RetrievedResult[] = [];
    let warning: string | undefined;
    try {
      results = await retriever.retrieve(query, n_results);
    } catch (error) {
      if (error instanceof InvalidQueryError) throw error;
      // Слой генерации получает "нет результатов", а не ошибку
      console.error('[API RAG] Ошибка поиска:', error);
      warning = errorMessage(error);
    }

    const context = results.length > 0
      ? formatContext(results, retriever.citationContext, { includeReferences: include_references })
      : NO_RESULTS_MESSAGE;
    const citationLinks = [
      ...new Set(results.map(r => formatCitationLink(r.metadata, retriever.citationContext))),
    ];

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    console.log(`[API RAG] Контекст готов за ${duration}s`);

    return NextResponse.json({
      success: true,
      query,
      context,
      results: results.map(r => ({
        id: r.id,
        text: r.text,
        source: r.source,
        score: parseFloat(r.score.toFixed(4)),
        boosted_score: parseFloat(r.boosted_score.toFixed(4)),
        metadata: r.metadata,
      })),
      citations: citationLinks,
      sources: summarizeSources(results),
      context_quality: evaluateContextQuality(results),
      warning,
      duration_seconds: parseFloat(duration),
    });
  } catch (error) {
    console.error('[API RAG] Ошибка:', error);
    if (error instanceof SyntaxError) {
      return NextResponse.json({ error: 'Тело запроса не является JSON', details: error.message }, { status: 400 });
    }
    return errorResponse(error, 'Ошибка при подготовке контекста');
  }
}
