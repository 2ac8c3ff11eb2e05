/**
 * Retry Handler
 *
 * Backoff for fork readiness polling, and bounded retries for calls to model
 * providers that fail on transient network or gateway errors.
 */

export interface RetryOptions {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0-1, fraction of the delay added at random */
  jitterFactor: number;
  /** Per-attempt deadline in ms */
  timeout?: number;
  retryCondition?: (error: Error) => boolean;
  onRetry?: (attempt: number, error: Error, nextDelayMs: number) => void;
}

const DEFAULT_RETRY: RetryOptions = {
  maxRetries: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  jitterFactor: 0.3,
};

/** base × 2^attempt, capped, plus jitter. */
export function calculateBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
  jitterFactor: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(baseDelayMs * 2 ** attempt, maxDelayMs);
  return Math.floor(capped + capped * jitterFactor * random());
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const TRANSIENT_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT']);
const TRANSIENT_MESSAGE =
  /econnreset|econnrefused|etimedout|socket|fetch failed|timed? ?out|\b(429|502|503|504)\b/;

/** Network failures, timeouts, rate limits and gateway errors. */
export function isRetriableError(error: Error): boolean {
  if ('code' in error && typeof error.code === 'string' && TRANSIENT_CODES.has(error.code)) {
    return true;
  }
  return TRANSIENT_MESSAGE.test(error.message.toLowerCase());
}

export async function withRetry<T>(fn: () => Promise<T>, options: Partial<RetryOptions> = {}): Promise<T> {
  const { maxRetries, baseDelayMs, maxDelayMs, jitterFactor, timeout, retryCondition, onRetry } = {
    ...DEFAULT_RETRY,
    ...options,
  };
  const shouldRetry = retryCondition ?? isRetriableError;

  for (let attempt = 0; ; attempt++) {
    try {
      return timeout ? await withTimeout(fn(), timeout) : await fn();
    } catch (caught) {
      const error = caught instanceof Error ? caught : new Error(String(caught));
      if (attempt >= maxRetries || !shouldRetry(error)) {
        throw error;
      }

      const delayMs = calculateBackoffDelay(attempt, baseDelayMs, maxDelayMs, jitterFactor);
      if (onRetry) {
        onRetry(attempt + 1, error, delayMs);
      } else {
        console.log(`[retry] Attempt ${attempt + 1}/${maxRetries} failed: ${error.message.slice(0, 100)}. Retrying in ${delayMs}ms`);
      }
      await sleep(delayMs);
    }
  }
}

export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, message?: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(message ?? `Operation timed out after ${timeoutMs}ms`)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}
