import { NextResponse } from 'next/server';
import type { ZodError } from 'zod';
import { InvalidQueryError, NotFoundError, errorMessage } from './errors';

/**
 * Ответ 400 по ошибке валидации тела запроса
 */
export function validationErrorResponse(error: ZodError) {
  const issue = error.issues[0];
  const field = issue?.path.join('.') || 'body';
  return NextResponse.json(
    { error: `Параметр "${field}" некорректен`, details: issue?.message ?? error.message },
    { status: 400 }
  );
}

/**
 * Ошибка пайплайна → HTTP ответ { error, details }
 */
export function errorResponse(error: unknown, message: string) {
  let status = 500;
  if (error instanceof InvalidQueryError) status = 400;
  else if (error instanceof NotFoundError) status = 404;

  return NextResponse.json({ error: message, details: errorMessage(error) }, { status });
}
