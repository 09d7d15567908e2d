import type { Context, Next } from 'hono';
import { envBool, parsePositiveInt } from '../lib/config.js';
import logger from '../lib/logger.js';

interface RateLimitEntry {
  count: number;
  resetAt: number;
}

export interface RateLimitOptions {
  /** Key clients by the first X-Forwarded-For hop. Defaults to TRUST_PROXY. */
  trustProxy?: boolean;
}

const buckets = new Map<string, RateLimitEntry>();
let allowedDecisions = 0;
let deniedDecisions = 0;
const deniedByScope = new Map<string, number>();
const MAX_DENIED_SCOPE_ENTRIES = 200;
const MAX_RATE_LIMIT_BUCKETS = parsePositiveInt(process.env.MAX_RATE_LIMIT_BUCKETS, 50_000);

function trimKeySegment(value: string, maxLen = 128): string {
  const trimmed = value.trim();
  return trimmed.length > maxLen ? trimmed.slice(0, maxLen) : trimmed;
}

// Cleanup expired entries every 60 seconds
const cleanupTimer = setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of buckets) {
    if (now >= entry.resetAt) {
      buckets.delete(key);
    }
  }
}, 60_000);
cleanupTimer.unref();

export function getRateLimitStats() {
  const topDeniedScopes = Array.from(deniedByScope.entries())
    .sort((a, b) => b[1] - a[1])
    .slice(0, 10)
    .map(([scope, count]) => ({ scope, count }));
  return {
    active_buckets: buckets.size,
    max_buckets: MAX_RATE_LIMIT_BUCKETS,
    allowed_decisions: allowedDecisions,
    denied_decisions: deniedDecisions,
    denied_by_scope: topDeniedScopes,
  };
}

// Test-only helper to avoid cross-test leakage from module-level state.
export function resetRateLimitStateForTests() {
  buckets.clear();
  allowedDecisions = 0;
  deniedDecisions = 0;
  deniedByScope.clear();
}

function recordDenied(scope: string): void {
  deniedDecisions += 1;
  deniedByScope.set(scope, (deniedByScope.get(scope) ?? 0) + 1);
  while (deniedByScope.size > MAX_DENIED_SCOPE_ENTRIES) {
    const oldest = deniedByScope.keys().next().value;
    if (!oldest) break;
    deniedByScope.delete(oldest);
  }
}

/**
 * Fixed-window, in-memory rate limiter keyed by client address and route.
 * @param maxRequests - Max requests allowed in the window
 * @param windowMs - Window duration in milliseconds
 */
export function rateLimitMiddleware(maxRequests: number, windowMs: number, options: RateLimitOptions = {}) {
  const trustProxy = options.trustProxy ?? envBool(process.env.TRUST_PROXY, false);

  return async (c: Context, next: Next) => {
    const scope = `${c.req.method}:${c.req.path}`;
    const forwarded = trustProxy ? c.req.header('x-forwarded-for')?.split(',')[0] : undefined;
    const key = forwarded?.trim()
      ? `ip:${trimKeySegment(forwarded)}:${scope}`
      : `anonymous:${scope}`;

    const now = Date.now();
    let entry = buckets.get(key);

    if (!entry || now >= entry.resetAt) {
      // Keep memory bounded under key-space abuse.
      while (buckets.size >= MAX_RATE_LIMIT_BUCKETS) {
        const oldest = buckets.keys().next().value;
        if (!oldest) break;
        buckets.delete(oldest);
      }
      entry = { count: 0, resetAt: now + windowMs };
      buckets.set(key, entry);
    } else {
      // Refresh insertion order so oldest buckets are evicted first.
      buckets.delete(key);
      buckets.set(key, entry);
    }

    entry.count++;
    const resetSeconds = Math.max(1, Math.ceil((entry.resetAt - now) / 1000));
    c.header('X-RateLimit-Limit', String(maxRequests));
    c.header('X-RateLimit-Remaining', String(Math.max(0, maxRequests - entry.count)));
    c.header('X-RateLimit-Reset', String(resetSeconds));

    if (entry.count > maxRequests) {
      recordDenied(scope);
      c.header('Retry-After', String(resetSeconds));
      logger.warn({ key, scope, count: entry.count, max: maxRequests }, 'Rate limit exceeded');
      return c.json({ error: 'Too many requests. Please try again later.', code: 'RATE_LIMITED' }, 429);
    }

    allowedDecisions += 1;
    await next();
  };
}
