/**
 * Повторы с экспоненциальной задержкой для внешних вызовов
 */

export interface RetryConfig {
  /** Максимум повторов (не считая первой попытки) */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Доля случайного разброса задержки, 0-1 */
  jitterFactor: number;
  backoffMultiplier: number;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  backoffMultiplier: 2,
};

/**
 * Задержка для попытки с учётом backoff и jitter
 */
export function calculateBackoffDelay(attempt: number, config: RetryConfig): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  const jitter = cappedDelay * config.jitterFactor * (Math.random() * 2 - 1);
  return Math.max(0, Math.round(cappedDelay + jitter));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function readStatus(error: object): number | undefined {
  if (!('status' in error)) return undefined;
  const status = error.status;
  return typeof status === 'number' ? status : undefined;
}

/**
 * Повторяем сетевые ошибки, таймауты, 408, 429 и 5xx
 */
export function isDefaultRetryable(error: unknown): boolean {
  if (!(error instanceof Error)) return false;

  const message = error.message.toLowerCase();
  if (
    message.includes('econnreset') ||
    message.includes('econnrefused') ||
    message.includes('etimedout') ||
    message.includes('socket hang up') ||
    message.includes('network') ||
    message.includes('timeout') ||
    message.includes('rate limit')
  ) {
    return true;
  }

  const status = readStatus(error);
  return status !== undefined && (status >= 500 || status === 429 || status === 408);
}

/**
 * Выполняет fn с повторами. После исчерпания попыток бросает последнюю ошибку.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {}
): Promise<T> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  const isRetryable = fullConfig.isRetryable ?? isDefaultRetryable;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= fullConfig.maxRetries || !isRetryable(error)) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(attempt, fullConfig);
      fullConfig.onRetry?.(attempt + 1, error, delayMs);
      console.warn(
        `[Retry] Попытка ${attempt + 1}/${fullConfig.maxRetries + 1} не удалась, ` +
          `повтор через ${delayMs}ms...`
      );
      await sleep(delayMs);
    }
  }
}
