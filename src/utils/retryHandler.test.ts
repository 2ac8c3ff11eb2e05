import { describe, expect, it, vi } from 'vitest';
import { calculateBackoffDelay, isRetriableError, withRetry, withTimeout } from './retryHandler';

describe('calculateBackoffDelay', () => {
  it('doubles per attempt up to the cap', () => {
    const noJitter = () => 0;
    expect(calculateBackoffDelay(0, 100, 2000, 0.2, noJitter)).toBe(100);
    expect(calculateBackoffDelay(3, 100, 2000, 0.2, noJitter)).toBe(800);
    expect(calculateBackoffDelay(10, 100, 2000, 0.2, noJitter)).toBe(2000);
  });

  it('adds jitter proportional to the delay', () => {
    expect(calculateBackoffDelay(1, 100, 2000, 0.5, () => 1)).toBe(300);
  });
});

describe('isRetriableError', () => {
  it('recognises network and gateway failures', () => {
    expect(isRetriableError(new Error('fetch failed'))).toBe(true);
    expect(isRetriableError(new Error('OpenAI API error: 503 Service Unavailable'))).toBe(true);
    expect(isRetriableError(new Error('QUEST_OPENAI_API_KEY is not set'))).toBe(false);
  });
});

describe('withRetry', () => {
  const fast = { baseDelayMs: 1, maxDelayMs: 1, jitterFactor: 0, onRetry: () => undefined };

  it('retries retriable errors until the call succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, fast)).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxRetries', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('socket hang up'));

    await expect(withRetry(fn, { ...fast, maxRetries: 2 })).rejects.toThrow('socket hang up');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry other errors', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('bad request'));

    await expect(withRetry(fn, fast)).rejects.toThrow('bad request');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('withTimeout', () => {
  it('rejects when the promise outlives the timeout', async () => {
    const never = new Promise<string>(() => undefined);
    await expect(withTimeout(never, 5, 'too slow')).rejects.toThrow('too slow');
  });

  it('passes the value through when it settles in time', async () => {
    await expect(withTimeout(Promise.resolve(7), 1000)).resolves.toBe(7);
  });
});
