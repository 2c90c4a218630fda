import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { parsePositiveInt } from './lib/config.js';
import logger from './lib/logger.js';
import { listActiveSessions } from './lib/session-lock.js';

let shuttingDown = false;
const app = createApp({ isShuttingDown: () => shuttingDown });

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal, activeSessions: listActiveSessions() }, 'Graceful shutdown initiated');

  server.close(() => {
    logger.info('HTTP server closed');
    process.exit(0);
  });

  // Force exit if in-flight sessions don't drain
  setTimeout(() => {
    logger.warn({ activeSessions: listActiveSessions() }, 'Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

const port = parsePositiveInt(process.env.PORT, 3001);

export function startServer() {
  if (server) return server;

  server = serve({ fetch: app.fetch, port });
  logger.info({ port }, `Promotion example server running at http://localhost:${port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}

export { app };
