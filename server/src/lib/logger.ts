import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test';

const logger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

export type Logger = pino.Logger;

/**
 * Creates a child logger scoped to one HTTP request / scan invocation.
 */
export function createRequestLogger(
  requestId: string,
  extra?: Record<string, unknown>,
): Logger {
  return logger.child({ requestId, ...extra });
}

export default logger;
