import { isOrchestrationError } from '../agents/runtime/errors.js';

const TRANSIENT_STATUSES = new Set([408, 425, 429, 500, 502, 503, 504, 529]);
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);
const TRANSIENT_PATTERNS = [
  'rate limit',
  'rate_limit',
  'too many requests',
  'overloaded',
  'temporarily unavailable',
  'aborted due to timeout',
  'timeout',
  'socket hang up',
  'fetch failed',
  'network error',
  'service unavailable',
  'gateway timeout',
  'bad gateway',
];

function field(value: unknown, key: string): unknown {
  if (value === null || typeof value !== 'object' || !(key in value)) return undefined;
  return Reflect.get(value, key);
}

function readHeader(headers: unknown, name: string): string | null {
  if (!headers || typeof headers !== 'object') return null;
  if (headers instanceof Headers) {
    return headers.get(name);
  }
  const key = Object.keys(headers).find((k) => k.toLowerCase() === name.toLowerCase());
  const value = key ? field(headers, key) : undefined;
  return typeof value === 'string' ? value : null;
}

function getStatusCode(error: unknown): number | null {
  for (const candidate of [field(error, 'status'), field(error, 'statusCode'), field(field(error, 'response'), 'status')]) {
    if (typeof candidate === 'number') return candidate;
  }
  return null;
}

function getErrorCode(error: unknown): string | null {
  const code = field(error, 'code');
  return typeof code === 'string' ? code.toUpperCase() : null;
}

export function isTransient(error: Error, rawError?: unknown): boolean {
  const candidate = rawError ?? error;
  // Taxonomy errors carry their own classification; never second-guess it
  if (isOrchestrationError(candidate)) return candidate.transient;

  const status = getStatusCode(candidate);
  if (status != null && TRANSIENT_STATUSES.has(status)) return true;

  const code = getErrorCode(candidate);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = error.message.toLowerCase();
  if (TRANSIENT_PATTERNS.some((p) => msg.includes(p))) return true;

  // Catch status text embedded in message ("Request failed with status 429")
  if (/\b(408|425|429|500|502|503|504|529)\b/.test(msg)) return true;
  return false;
}

/**
 * Extract Retry-After delay from provider error headers.
 * Returns delay in milliseconds, or 0 if not present.
 */
function getRetryAfterMs(error: unknown): number {
  // SDK errors may attach headers directly or under response.headers.
  const retryAfter = readHeader(field(error, 'headers'), 'retry-after')
    ?? readHeader(field(field(error, 'response'), 'headers'), 'retry-after');
  if (!retryAfter) return 0;

  const seconds = parseFloat(retryAfter);
  if (!isNaN(seconds) && seconds > 0) {
    // Cap at 60s to prevent absurd waits
    return Math.min(seconds, 60) * 1000;
  }
  return 0;
}

export interface RetryOptions {
  maxAttempts?: number;
  baseDelay?: number;
  /** Stop retrying (and skip the backoff sleep) once this signal aborts */
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: Error) => void;
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxAttempts = options?.maxAttempts ?? 3;
  const baseDelay = options?.baseDelay ?? 1000;

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt >= maxAttempts || options?.signal?.aborted || !isTransient(lastError, err)) {
        throw lastError;
      }

      options?.onRetry?.(attempt, lastError);

      // Prefer server-specified Retry-After delay; fall back to exponential backoff
      const retryAfterMs = getRetryAfterMs(err);
      const delay = retryAfterMs > 0
        ? retryAfterMs
        : baseDelay * Math.pow(2, attempt - 1) * (0.5 + Math.random());
      if (delay > 0) {
        await sleep(delay, options?.signal);
      }
    }
  }

  throw lastError ?? new Error('withRetry: no attempts were made');
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
