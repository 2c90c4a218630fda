import { describe, expect, it } from 'vitest';
import { createApp } from '../app.js';
import type { SessionReport, SessionState } from '../agents/types.js';
import { DEFAULT_CONFIG } from '../lib/config.js';
import { ScriptedBackend, sessionInput, type ScriptOptions } from './helpers/scripted-backend.js';

function testApp(script: ScriptOptions = {}) {
  return createApp({
    backendFactory: () => new ScriptedBackend(script),
    config: { ...DEFAULT_CONFIG, retry_base_delay_ms: 0 },
  });
}

function post(app: ReturnType<typeof createApp>, path: string, body: unknown) {
  return app.request(`http://test${path}`, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}

describe('GET /health', () => {
  it('reports status, live sessions and collaborator count', async () => {
    const res = await testApp().request('http://test/health');

    expect(res.status).toBe(200);
    expect(res.headers.get('cache-control')).toBe('no-store');
    expect(res.headers.get('x-content-type-options')).toBe('nosniff');
    expect(res.headers.get('x-request-id')).toBeTruthy();
    const body = await res.json() as { status: string; active_sessions: number; collaborators: number };
    expect(body).toMatchObject({ status: 'ok', active_sessions: 0, collaborators: 13 });
  });

  it('reports draining while shutting down and refuses new work', async () => {
    const app = createApp({ isShuttingDown: () => true });

    const health = await app.request('http://test/health');
    expect(await health.json()).toMatchObject({ status: 'draining' });

    const res = await post(app, '/api/sessions', sessionInput());
    expect(res.status).toBe(503);
  });
});

describe('sessions routes', () => {
  it('runs a session and returns its report', async () => {
    const res = await post(testApp(), '/api/sessions', sessionInput({ session_id: 'http-session' }));

    expect(res.status).toBe(200);
    const report = await res.json() as SessionReport;
    expect(report).toMatchObject({ session_id: 'http-session', status: 'completed', final_stage: 'finalized' });
    expect(report.examples.map((e) => e.status)).toEqual(['finalized']);
  });

  it('rejects malformed JSON', async () => {
    const res = await post(testApp(), '/api/sessions', '{"profile":');

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('rejects payloads that fail validation with the issues', async () => {
    const res = await post(testApp(), '/api/sessions', { profile: { name: 'A' } });

    expect(res.status).toBe(400);
    const body = await res.json() as { error: string; details: Array<{ path: string[] }> };
    expect(body.error).toBe('Invalid request');
    expect(body.details.map((issue) => issue.path.join('.'))).toContain('position');
  });

  it('returns 404 for sessions that are not running', async () => {
    const app = testApp();

    expect((await app.request('http://test/api/sessions/nope')).status).toBe(404);
    expect((await post(app, '/api/sessions/nope/cancel', {})).status).toBe(404);
    expect((await app.request('http://test/api/unknown')).status).toBe(404);
  });

  it('exposes a live session, rejects a duplicate run and cancels it', async () => {
    let entered = () => {};
    const inFlight = new Promise<void>((resolve) => {
      entered = resolve;
    });
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const app = testApp({
      override: {
        orchestrator: async () => {
          entered();
          await gate;
          return { 'orchestrator.brief': { summary: 'brief' } };
        },
      },
    });
    const input = sessionInput({ session_id: 'live-session' });

    const running = post(app, '/api/sessions', input);
    await inFlight;

    const duplicate = await post(app, '/api/sessions', input);
    expect(duplicate.status).toBe(409);
    expect(await duplicate.json()).toMatchObject({ code: 'SessionBusy' });

    const status = await app.request('http://test/api/sessions/live-session');
    expect(status.status).toBe(200);
    expect(await status.json() as SessionState).toMatchObject({ status: 'running', stage: 'intake', turns_used: 0 });

    const cancel = await post(app, '/api/sessions/live-session/cancel', {});
    expect(cancel.status).toBe(202);

    release();
    const res = await running;
    const report = await res.json() as SessionReport;
    expect(report.status).toBe('failed');
    expect(report.failure?.code).toBe('SessionCancelled');
    expect(report.turns_used).toBe(1);
  });
});
