import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { requestIdMiddleware, resolveRequestId } from '../middleware/request-id.js';

function taggedApp() {
  const app = new Hono();
  app.use('*', requestIdMiddleware);
  app.get('/api/sessions/:id', (c) => {
    const log = c.get('log');
    return c.json({
      session: c.req.param('id'),
      requestId: c.get('requestId'),
      loggerBound: log.bindings().requestId === c.get('requestId'),
    });
  });
  return app;
}

describe('requestIdMiddleware', () => {
  it('echoes a safe caller id and binds it to the request logger', async () => {
    const res = await taggedApp().request('http://test/api/sessions/s-1', {
      headers: { 'X-Request-ID': 'trace.7:abc_DEF' },
    });

    expect(res.status).toBe(200);
    expect(res.headers.get('X-Request-ID')).toBe('trace.7:abc_DEF');
    expect(await res.json()).toEqual({ session: 's-1', requestId: 'trace.7:abc_DEF', loggerBound: true });
  });

  it('replaces an id with unsafe characters', async () => {
    const res = await taggedApp().request('http://test/api/sessions/s-1', {
      headers: { 'X-Request-ID': 'bad id' },
    });

    const echoed = res.headers.get('X-Request-ID') ?? '';
    expect(echoed).not.toContain('bad');
    expect(echoed).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('generates an id when the caller sends none', async () => {
    const res = await taggedApp().request('http://test/api/sessions/s-2');
    const body = await res.json() as { requestId: string };

    expect(body.requestId).toBe(res.headers.get('X-Request-ID'));
    expect(body.requestId).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe('resolveRequestId', () => {
  it('trims caller ids before validating them', () => {
    expect(resolveRequestId('  trace-42  ')).toBe('trace-42');
  });

  it('keeps the first 64 characters of a long id', () => {
    expect(resolveRequestId('r'.repeat(100))).toBe('r'.repeat(64));
  });

  it('generates a UUID for blank input', () => {
    expect(resolveRequestId('   ')).toMatch(/^[0-9a-f-]{36}$/);
  });
});
