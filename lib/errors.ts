export type RagErrorCode =
  | 'NOT_FOUND'
  | 'EMBEDDING_SERVICE'
  | 'STORE'
  | 'INVALID_QUERY';

/**
 * Базовая ошибка RAG пайплайна
 */
export class RagError extends Error {
  readonly code: RagErrorCode;

  constructor(message: string, code: RagErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RagError';
    this.code = code;
  }
}

export class NotFoundError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

export class EmbeddingServiceError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EMBEDDING_SERVICE', options);
    this.name = 'EmbeddingServiceError';
  }
}

export class StoreError extends RagError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'STORE', options);
    this.name = 'StoreError';
  }
}

export class InvalidQueryError extends RagError {
  constructor(message: string) {
    super(message, 'INVALID_QUERY');
    this.name = 'InvalidQueryError';
  }
}

/**
 * Текст ошибки для логов и ответов API
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
