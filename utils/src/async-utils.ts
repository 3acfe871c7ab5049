/**
 * Promise helpers: sleeping, deadlines and exponential-backoff retries.
 */

export interface RetryOptions {
  maxRetries: number;
  baseDelay: number; // milliseconds
  maxDelay: number; // milliseconds
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (attempt: number, error: unknown) => void;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxRetries: 3,
  baseDelay: 1000,
  maxDelay: 10000,
};

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function timeout<T>(promise: Promise<T>, ms: number, message?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message || `Timed out after ${ms}ms`)), ms);
  });

  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}

/**
 * Delay before retry number `attempt + 1`, with up to 10% jitter.
 */
export function backoffDelay(attempt: number, options: Pick<RetryOptions, 'baseDelay' | 'maxDelay'>): number {
  const exponentialDelay = options.baseDelay * Math.pow(2, attempt);
  const jitter = Math.random() * 0.1 * exponentialDelay;
  return Math.min(exponentialDelay + jitter, options.maxDelay);
}

export async function retry<T>(
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const config = { ...DEFAULT_RETRY_OPTIONS, ...options };

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (config.shouldRetry && !config.shouldRetry(error)) {
        throw error;
      }
      if (attempt >= config.maxRetries) {
        throw error;
      }

      config.onRetry?.(attempt + 1, error);
      await sleep(backoffDelay(attempt, config));
    }
  }
}
