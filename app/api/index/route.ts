import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';
import { errorResponse, validationErrorResponse } from '@/lib/api-errors';
import { getRagPipeline } from '@/lib/pipeline';

const IndexRequestSchema = z.object({
  force_reindex: z.boolean().optional().default(false),
  source_ids: z.array(z.string().min(1)).optional(),
});

/**
 * POST /api/index
 * Индексирует документы из data/documents.json
 *
 * Body: {
 *   force_reindex?: boolean,  // Переиндексировать даже без изменений
 *   source_ids?: string[]     // Только указанные источники
 * }
 */
export async function POST(request: NextRequest) {
  const startTime = Date.now();

  try {
    const text = await request.text();
    const parsed = IndexRequestSchema.safeParse(text.trim() ? JSON.parse(text) : {});
    if (!parsed.success) {
      return validationErrorResponse(parsed.error);
    }
    const { force_reindex, source_ids } = parsed.data;

    console.log(`[API Index] Начало индексации (force_reindex=${force_reindex})...`);

    const pipeline = await getRagPipeline();
    const outcomes = await pipeline.indexAll({ forceReindex: force_reindex, sourceIds: source_ids });

    const duration = ((Date.now() - startTime) / 1000).toFixed(2);
    const totalChunks = outcomes.reduce((sum, outcome) => sum + outcome.chunkCount, 0);

    console.log(`[API Index] Индексация завершена за ${duration}s`);

    return NextResponse.json({
      success: true,
      message: 'Индексация завершена',
      documents: outcomes.map(outcome => ({
        file: outcome.filePath,
        source_id: outcome.sourceId,
        status: outcome.status,
        chunk_count: outcome.chunkCount,
      })),
      stats: {
        total_documents: outcomes.length,
        total_chunks: totalChunks,
        duration_seconds: parseFloat(duration),
      },
    });
  } catch (error) {
    console.error('[API Index] Ошибка индексации:', error);
    if (error instanceof SyntaxError) {
      return NextResponse.json({ error: 'Тело запроса не является JSON', details: error.message }, { status: 400 });
    }
    return errorResponse(error, 'Ошибка при индексации документов');
  }
}

/**
 * GET /api/index
 * Возвращает состояние индекса (манифест)
 */
export async function GET() {
  try {
    const pipeline = await getRagPipeline();
    const stats = await pipeline.getStats();

    return NextResponse.json({
      exists: stats.total_chunks > 0,
      total_chunks: stats.total_chunks,
      index_state: stats.index_state,
    });
  } catch (error) {
    console.error('[API Index] Ошибка чтения индекса:', error);
    return errorResponse(error, 'Ошибка при чтении индекса');
  }
}
