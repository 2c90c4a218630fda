import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

function defaultLevel(): pino.LevelWithSilent {
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  name: 'promotion-orchestrator',
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  timestamp: pino.stdTimeFunctions.isoTime,
  serializers: { err: pino.stdSerializers.err },
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, ignore: 'pid,hostname' },
        },
      }),
});

export type Logger = typeof logger;

/**
 * Child logger for one orchestration session. Every line it writes carries
 * `sessionId`, so a session's turns can be followed across interleaved runs.
 */
export function createSessionLogger(
  sessionId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ sessionId, ...extra });
}

export default logger;
