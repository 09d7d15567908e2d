import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import { createRequestLogger, type Logger } from '../lib/logger.js';

declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
    log: Logger;
  }
}

const SAFE_REQUEST_ID_RE = /^[A-Za-z0-9._:-]+$/;

export function resolveRequestId(raw: string | undefined): string {
  if (raw) {
    const candidate = raw.trim().slice(0, 64);
    if (SAFE_REQUEST_ID_RE.test(candidate)) return candidate;
  }
  return randomUUID();
}

export async function requestIdMiddleware(c: Context, next: Next) {
  const requestId = resolveRequestId(c.req.header('X-Request-ID'));
  c.set('requestId', requestId);
  c.set('log', createRequestLogger(requestId, { method: c.req.method, path: c.req.path }));
  c.header('X-Request-ID', requestId);
  await next();
}
