import { describe, it, expect, vi } from 'vitest';
import { withRetry, isTransient } from '../lib/retry.js';
import {
  BackendUnavailable,
  InvalidOutput,
  OwnershipViolation,
  TurnTimeout,
} from '../agents/runtime/index.js';

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) {
        const err = new Error('temporary outage') as Error & { status?: number };
        err.status = 503;
        throw err;
      }
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) {
        const err = new Error('socket closed') as Error & { code?: string };
        err.code = 'ECONNRESET';
        throw err;
      }
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('uses Retry-After header from response metadata', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        const err = new Error('rate limited') as Error & {
          response?: { status: number; headers: Headers };
        };
        err.response = {
          status: 429,
          headers: new Headers([['retry-after', '0.001']]),
        };
        throw err;
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1, onRetry });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
    expect(onRetry).toHaveBeenCalledOnce();
    expect(onRetry).toHaveBeenCalledWith(1, expect.any(Error));
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('validation failed');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('validation failed');
    expect(attempts).toBe(1);
  });

  it('does not retry an aborted operation', async () => {
    const onRetry = vi.fn();
    let attempts = 0;

    await expect(
      withRetry(
        async () => {
          attempts += 1;
          throw new DOMException('Aborted by caller', 'AbortError');
        },
        { maxAttempts: 3, baseDelay: 1, onRetry },
      ),
    ).rejects.toThrow('Aborted by caller');

    expect(attempts).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('stops once the signal aborts even when the error is transient', async () => {
    const controller = new AbortController();
    let attempts = 0;

    await expect(
      withRetry(
        async () => {
          attempts += 1;
          controller.abort();
          throw new BackendUnavailable('upstream 503');
        },
        { maxAttempts: 3, baseDelay: 1, signal: controller.signal },
      ),
    ).rejects.toThrow('upstream 503');

    expect(attempts).toBe(1);
  });

  it('retries orchestration errors flagged transient', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) throw new BackendUnavailable();
      return 'second';
    }, { maxAttempts: 2, baseDelay: 0 });

    expect(result).toBe('second');
    expect(attempts).toBe(2);
  });

  it('fails fast on orchestration errors that are not transient', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new InvalidOutput('context-scorer', 'score: Required');
    }, { maxAttempts: 3, baseDelay: 0 })).rejects.toBeInstanceOf(InvalidOutput);
    expect(attempts).toBe(1);
  });
});

describe('isTransient', () => {
  it('trusts the orchestration flag over the message text', () => {
    const timeout = new TurnTimeout('star-writer', 10);
    const ownership = new OwnershipViolation('star-writer', 'score.context', ['context-scorer']);

    expect(isTransient(timeout)).toBe(true);
    expect(isTransient(ownership)).toBe(false);
  });

  it('reads status codes embedded in the message', () => {
    expect(isTransient(new Error('Request failed with status 502'))).toBe(true);
    expect(isTransient(new Error('Request failed with status 400'))).toBe(false);
  });
});
