import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { requestIdMiddleware } from './middleware/request-id.js';
import { getRateLimitStats } from './middleware/rate-limit.js';
import { createScanRoutes } from './routes/scans.js';
import { createReportRoutes } from './routes/reports.js';
import { loadScoringConfig, readServerSettings, type ServerSettings } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { getScanMetrics, recordRequestMetric } from './lib/scan-metrics.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';
import { createResumeScanner, type ResumeScanner } from './scanner/resume-scanner.js';
import { FileReportStore, type ReportStore } from './scanner/report-store.js';

export interface AppDeps {
  scanner: ResumeScanner;
  store: ReportStore;
  settings: ServerSettings;
}

const isProduction = process.env.NODE_ENV === 'production';
const startTime = Date.now();
let shuttingDown = false;

export function createApp({ scanner, store, settings }: AppDeps) {
  const app = new Hono();

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    let status = 500;
    try {
      if (shuttingDown && c.req.path !== '/health') {
        status = 503;
        return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
      }
      await next();
      status = c.res.status;
    } finally {
      recordRequestMetric(status);
    }
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: shuttingDown ? 'draining' : 'ok',
      ai_configured: scanner.aiConfigured,
      timestamp: new Date().toISOString(),
    });
  });

  app.get('/metrics', (c) => {
    c.header('Cache-Control', 'no-store');
    const metricsKey = process.env.METRICS_KEY;
    if (metricsKey) {
      if (c.req.header('Authorization') !== `Bearer ${metricsKey}`) {
        return c.json({ error: 'Unauthorized' }, 401);
      }
    } else if (isProduction) {
      return c.json({ error: 'Not found' }, 404);
    }

    const memUsage = process.memoryUsage();
    return c.json({
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      shutting_down: shuttingDown,
      scan_runtime: getScanMetrics(),
      rate_limit_runtime: getRateLimitStats(),
      memory: {
        rss_mb: Math.round(memUsage.rss / 1024 / 1024),
        heap_used_mb: Math.round(memUsage.heapUsed / 1024 / 1024),
      },
      node_version: process.version,
    });
  });

  app.route('/api/scans', createScanRoutes({
    scanner,
    maxUploadBytes: settings.maxUploadBytes,
    rateLimit: { max: settings.scanRateLimitMax, windowMs: settings.scanRateLimitWindowMs },
  }));
  app.route('/api/reports', createReportRoutes(store));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}

let server: ReturnType<typeof serve> | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const flushTask = flushSentry(2000).catch((err: unknown) => {
    logger.warn({ error: errorMessage(err) }, 'Shutdown flush failed');
  });

  // Close HTTP server (stop accepting new connections)
  server.close(() => {
    void Promise.race([
      flushTask,
      new Promise((resolve) => setTimeout(resolve, 3_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  // Force exit after 10s if connections don't drain
  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export async function startServer() {
  if (server) return server;

  await initSentry();
  const settings = readServerSettings();
  const config = loadScoringConfig();
  const store = new FileReportStore(settings.reportDir);
  const app = createApp({
    scanner: createResumeScanner(settings, config, store),
    store,
    settings,
  });

  logger.info({
    port: settings.port,
    report_dir: settings.reportDir,
    keywords: config.keywords.length,
    ai_enabled: settings.ai.enabled,
    ai_key_present: Boolean(settings.ai.apiKey),
  }, 'ATS resume scanner starting');
  server = serve({ fetch: app.fetch, port: settings.port });
  logger.info({ port: settings.port }, `Server running at http://localhost:${settings.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    captureError(err, { source: 'uncaughtException' });
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
  startServer().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  });
}
