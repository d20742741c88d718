import logger from './logger';

export interface RetryOptions {
  maxAttempts: number;
  delayMs: number;
  exponentialBackoff?: boolean;
  shouldRetry?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const { maxAttempts, delayMs, exponentialBackoff = true, shouldRetry, onRetry } = options;

  let lastError: Error | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      if (attempt === maxAttempts || (shouldRetry && !shouldRetry(lastError))) {
        break;
      }

      const delay = exponentialBackoff
        ? delayMs * Math.pow(2, attempt - 1)
        : delayMs;

      logger.warn(`Retry attempt ${attempt}/${maxAttempts} after ${delay}ms`, {
        error: lastError.message,
      });

      if (onRetry) {
        onRetry(attempt, lastError);
      }

      await sleep(delay);
    }
  }

  throw lastError || new Error('Retry failed with unknown error');
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function readProperty(error: unknown, key: string): unknown {
  if (typeof error === 'object' && error !== null && key in error) {
    return Reflect.get(error, key);
  }
  return undefined;
}

function statusCodeOf(error: unknown): number | undefined {
  const status = readProperty(error, 'status') ?? readProperty(error, 'statusCode');
  if (typeof status === 'number') {
    return status;
  }
  const response = readProperty(error, 'response');
  const responseStatus = readProperty(response, 'status');
  return typeof responseStatus === 'number' ? responseStatus : undefined;
}

export function isRateLimitError(error: unknown): boolean {
  return statusCodeOf(error) === 429 || readProperty(error, 'code') === 'rate_limit_exceeded';
}

export function isRetryableError(error: unknown): boolean {
  const retryableStatusCodes = [408, 429, 500, 502, 503, 504];
  const statusCode = statusCodeOf(error);

  if (statusCode !== undefined) {
    return retryableStatusCodes.includes(statusCode);
  }

  const retryableCodes = ['ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED'];
  const code = readProperty(error, 'code');
  return typeof code === 'string' && retryableCodes.includes(code);
}
