import { NextResponse } from 'next/server';
import { errorMessage } from '@/lib/errors';
import { getRagPipeline } from '@/lib/pipeline';

interface StatusIssue {
  component: string;
  message: string;
  solution: string;
}

/**
 * GET /api/rag/status
 * Статистика индекса и готовность компонентов
 */
export async function GET() {
  const timestamp = new Date().toISOString();
  const errors: StatusIssue[] = [];
  const warnings: StatusIssue[] = [];

  try {
    const pipeline = await getRagPipeline();
    const stats = await pipeline.getStats();

    const indexedFiles = Object.keys(stats.index_state.indexed_files).length;
    if (stats.total_chunks === 0) {
      warnings.push({
        component: 'vector_store',
        message: 'Индекс пустой - нет проиндексированных норм',
        solution: 'Добавьте документы в data/documents/ и вызовите POST /api/index',
      });
    }

    const missingSources = [...pipeline.registry.keys()].filter(id => !(id in stats.sources));

    return NextResponse.json({
      timestamp,
      ready: stats.total_chunks > 0,
      stats,
      components: {
        vector_store: {
          status: stats.total_chunks > 0 ? 'ready' : 'empty',
          collection: stats.collection,
          total_chunks: stats.total_chunks,
        },
        embeddings: {
          status: 'configured',
          model: stats.embedding_model,
        },
        manifest: {
          indexed_files: indexedFiles,
          last_update: stats.index_state.last_update,
        },
        sources: {
          registered: pipeline.registry.size,
          indexed: Object.keys(stats.sources).length,
          not_indexed: missingSources,
        },
      },
      errors,
      warnings,
    });
  } catch (error) {
    console.error('[API Status] Ошибка проверки статуса:', error);
    errors.push({
      component: 'pipeline',
      message: errorMessage(error),
      solution: 'Проверьте data/sources.json, data/sentencias.json и настройки EMBEDDING_PROVIDER',
    });

    return NextResponse.json({ timestamp, ready: false, errors, warnings }, { status: 500 });
  }
}
