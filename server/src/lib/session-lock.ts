import { SessionBusy } from '../agents/runtime/errors.js';
import logger from './logger.js';

/**
 * Process-wide reentrancy guard keyed by session id.
 *
 * Turns within a session are strictly serialised, so no waiting lock is needed:
 * a second run on a session id that is already in flight is rejected with
 * SessionBusy before it touches any state.
 */
const activeSessions = new Map<string, number>(); // session_id -> acquired_at (epoch ms)

export function isSessionActive(sessionId: string): boolean {
  return activeSessions.has(sessionId);
}

export function listActiveSessions(): string[] {
  return [...activeSessions.keys()];
}

/**
 * Executes fn() while holding the session guard. Rejects with SessionBusy,
 * without calling fn(), if the session is already running.
 */
export async function withSessionLock<T>(
  sessionId: string,
  fn: () => Promise<T>,
): Promise<T> {
  if (activeSessions.has(sessionId)) {
    logger.warn({ sessionId }, 'Rejected concurrent run on busy session');
    throw new SessionBusy(sessionId);
  }
  activeSessions.set(sessionId, Date.now());

  try {
    return await fn();
  } finally {
    activeSessions.delete(sessionId);
  }
}
