import { randomUUID } from 'node:crypto';
import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { LlmGenerationBackend } from '../agents/generation-backend.js';
import type { GenerationBackend } from '../agents/runtime/agent-protocol.js';
import type { CollaboratorRegistry } from '../agents/runtime/agent-registry.js';
import { SessionBusy } from '../agents/runtime/errors.js';
import { SessionController } from '../agents/session-controller.js';
import { SessionInputSchema } from '../agents/types.js';
import { loadConfig, parsePositiveInt, type OrchestrationConfig } from '../lib/config.js';
import { isSessionActive } from '../lib/session-lock.js';
import { validateBody } from '../lib/validate.js';

const MAX_CREATE_SESSION_BODY_BYTES = parsePositiveInt(process.env.MAX_CREATE_SESSION_BODY_BYTES, 200_000);

export interface SessionsRouterOptions {
  /** A fresh backend per session; defaults to the configured LLM provider */
  backendFactory?: () => GenerationBackend;
  registryFactory?: () => CollaboratorRegistry;
  config?: OrchestrationConfig;
}

/**
 * POST /            run a session to completion and return its report
 * GET  /:id         status of a session that is still running
 * POST /:id/cancel  request cooperative cancellation
 */
export function createSessionsRouter(options: SessionsRouterOptions = {}) {
  const backendFactory = options.backendFactory ?? (() => new LlmGenerationBackend());
  const config = options.config ?? loadConfig();
  const live = new Map<string, SessionController>();
  const sessions = new Hono();

  sessions.post(
    '/',
    bodyLimit({
      maxSize: MAX_CREATE_SESSION_BODY_BYTES,
      onError: (c) => c.json({ error: `Request too large (max ${MAX_CREATE_SESSION_BODY_BYTES} bytes)` }, 413),
    }),
    async (c) => {
      const log = c.get('log');
      let body: unknown;
      try {
        body = await c.req.json();
      } catch {
        return c.json({ error: 'Invalid JSON body' }, 400);
      }

      const parsed = validateBody(SessionInputSchema, body);
      if (!parsed.success) return c.json({ error: 'Invalid request', details: parsed.issues }, 400);

      const sessionId = parsed.data.session_id ?? randomUUID();
      if (isSessionActive(sessionId)) {
        return c.json({ error: `Session ${sessionId} is already running`, code: 'SessionBusy' }, 409);
      }

      const controller = new SessionController({
        backend: backendFactory(),
        registry: options.registryFactory?.(),
        config,
        emit: (event) => log.debug({ event }, 'Session event'),
      });
      live.set(sessionId, controller);

      try {
        const report = await controller.start({ ...parsed.data, session_id: sessionId });
        return c.json(report, 200);
      } catch (err) {
        if (err instanceof SessionBusy) {
          return c.json({ error: err.message, code: err.code }, 409);
        }
        log.error({ err, sessionId }, 'Session run failed unexpectedly');
        return c.json({ error: 'Session could not be run' }, 500);
      } finally {
        live.delete(sessionId);
      }
    },
  );

  sessions.get('/:id', (c) => {
    const state = live.get(c.req.param('id'))?.status();
    if (!state) return c.json({ error: 'Session not found or no longer running' }, 404);
    return c.json(state, 200);
  });

  sessions.post('/:id/cancel', (c) => {
    const sessionId = c.req.param('id');
    const controller = live.get(sessionId);
    if (!controller) return c.json({ error: 'Session not found or no longer running' }, 404);
    controller.cancel();
    c.get('log').info({ sessionId }, 'Cancellation requested');
    return c.json({ session_id: sessionId, cancel_requested: true }, 202);
  });

  return sessions;
}
