import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import logger, { type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._:-]+$/;
const MAX_REQUEST_ID_LENGTH = 64;

/** Caller-supplied X-Request-ID when it is safe to echo, otherwise a fresh UUID. */
export function resolveRequestId(raw: string | undefined): string {
  if (raw) {
    const candidate = raw.trim().slice(0, MAX_REQUEST_ID_LENGTH);
    if (REQUEST_ID_PATTERN.test(candidate)) return candidate;
  }
  return randomUUID();
}

/**
 * Tags every request with an id (echoed in X-Request-ID) and a child logger
 * carrying it, then logs the outcome once the handler finishes.
 */
export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  const log = logger.child({ requestId });
  const startedAt = Date.now();

  c.set('requestId', requestId);
  c.set('log', log);
  c.header('X-Request-ID', requestId);

  await next();

  log.debug(
    { method: c.req.method, path: c.req.path, status: c.res.status, durationMs: Date.now() - startedAt },
    'Request handled',
  );
}
