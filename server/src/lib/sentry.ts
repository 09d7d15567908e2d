import logger from './logger.js';
import { errorMessage } from './errors.js';

type SentryModule = typeof import('@sentry/node');

let sentry: SentryModule | null = null;

const SENSITIVE_ENV_KEYS = ['OPENROUTER_API_KEY', 'METRICS_KEY', 'SENTRY_DSN'];
const SENSITIVE_FIELD_RE = /key|token|secret|authorization/i;

/**
 * Loads and initializes @sentry/node when SENTRY_DSN is set. Without a DSN
 * every export in this module is a no-op.
 */
export async function initSentry(): Promise<void> {
  const dsn = process.env.SENTRY_DSN;
  if (!dsn) {
    logger.info('SENTRY_DSN not set, Sentry disabled');
    return;
  }

  let loaded: SentryModule;
  try {
    loaded = await import('@sentry/node');
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Sentry requested but @sentry/node could not be loaded; continuing without it');
    return;
  }

  loaded.init({
    dsn,
    environment: process.env.NODE_ENV ?? 'development',
    tracesSampleRate: 0.1,
    beforeSend(event) {
      if (event.extra) {
        for (const key of SENSITIVE_ENV_KEYS) {
          if (key in event.extra) event.extra[key] = '[REDACTED]';
        }
      }
      for (const crumb of event.breadcrumbs ?? []) {
        if (!crumb.data) continue;
        for (const key of Object.keys(crumb.data)) {
          if (SENSITIVE_FIELD_RE.test(key)) crumb.data[key] = '[REDACTED]';
        }
      }
      return event;
    },
  });
  sentry = loaded;
  logger.info('Sentry initialized');
}

export function captureError(err: unknown, context?: Record<string, unknown>): void {
  const client = sentry;
  if (!client) return;
  client.withScope((scope) => {
    if (context) {
      for (const [key, value] of Object.entries(context)) {
        scope.setExtra(key, value);
      }
    }
    client.captureException(err);
  });
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!sentry) return;
  try {
    await sentry.flush(timeoutMs);
  } catch (err) {
    logger.warn({ error: errorMessage(err) }, 'Sentry flush failed during shutdown');
  }
}
