import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { createDefaultRegistry } from './agents/collaborators.js';
import logger from './lib/logger.js';
import { listActiveSessions } from './lib/session-lock.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createSessionsRouter, type SessionsRouterOptions } from './routes/sessions.js';

export interface AppOptions extends SessionsRouterOptions {
  /** Reports `draining` on /health and refuses new work while true */
  isShuttingDown?: () => boolean;
}

const isProduction = process.env.NODE_ENV === 'production';
const allowedOrigins = process.env.ALLOWED_ORIGINS
  ? process.env.ALLOWED_ORIGINS.split(',').map((o) => o.trim())
  : isProduction
    ? []
    : ['http://localhost:5173'];

export function createApp(options: AppOptions = {}) {
  const app = new Hono();
  const isShuttingDown = options.isShuttingDown ?? (() => false);
  const collaborators = (options.registryFactory ?? createDefaultRegistry)().size;

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    if (isShuttingDown() && c.req.path !== '/health') {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.use('*', cors({ origin: allowedOrigins }));

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: isShuttingDown() ? 'draining' : 'ok',
      active_sessions: listActiveSessions().length,
      collaborators,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/sessions', createSessionsRouter(options));

  app.notFound((c) => c.json({ error: 'Not found' }, 404));

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
