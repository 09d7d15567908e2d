import { Hono } from 'hono';
import { z } from 'zod';
import { ScanError } from '../lib/errors.js';
import logger from '../lib/logger.js';
import { recordScanOutcome } from '../lib/scan-metrics.js';
import { formatHintFor, rejectOversizedUpload, uploadTooLargeMessage } from '../lib/upload-guard.js';
import { rateLimitMiddleware } from '../middleware/rate-limit.js';
import { summarizeSignals, toDisplayPayload } from '../scanner/presentation.js';
import type { ResumeScanner } from '../scanner/resume-scanner.js';

export const MAX_JOB_TITLE_CHARS = 120;

const scanFormSchema = z.object({
  file: z.instanceof(File, { message: 'A resume file (PDF or DOCX) is required' }),
  job_title: z.string().trim().max(MAX_JOB_TITLE_CHARS).optional(),
  ai: z.enum(['true', 'false']).optional(),
});

export interface ScanRoutesOptions {
  scanner: ResumeScanner;
  maxUploadBytes: number;
  rateLimit: { max: number; windowMs: number; trustProxy?: boolean };
}

export function createScanRoutes({ scanner, maxUploadBytes, rateLimit }: ScanRoutesOptions) {
  const scans = new Hono();

  scans.use('*', rateLimitMiddleware(rateLimit.max, rateLimit.windowMs, { trustProxy: rateLimit.trustProxy }));

  // POST /api/scans: score an uploaded resume and generate its report
  scans.post('/', async (c) => {
    const log = c.get('log') ?? logger;
    const startedAt = Date.now();

    const oversized = rejectOversizedUpload(c, maxUploadBytes);
    if (oversized) return oversized;

    let body: Record<string, string | File>;
    try {
      body = await c.req.parseBody();
    } catch (err) {
      log.debug({ err }, 'Malformed multipart body');
      return c.json({ error: 'Expected a multipart/form-data upload', code: 'INVALID_REQUEST' }, 400);
    }

    const parsed = scanFormSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      return c.json({ error: issue?.message ?? 'Invalid request', code: 'INVALID_REQUEST' }, 400);
    }

    const { file, job_title: jobTitle, ai } = parsed.data;
    if (file.size > maxUploadBytes) {
      return c.json({ error: uploadTooLargeMessage(maxUploadBytes), code: 'UPLOAD_TOO_LARGE' }, 413);
    }

    try {
      const bytes = new Uint8Array(await file.arrayBuffer());
      const outcome = await scanner.scan(bytes, formatHintFor(file), ai !== 'false', {
        signal: c.req.raw.signal,
        jobTitle: jobTitle || undefined,
        logger: log,
      });

      const insight = outcome.result.feedback.some((item) => item.severity === 'insight');
      recordScanOutcome(outcome.report ? 'scored' : 'report_degraded', Date.now() - startedAt, {
        score: outcome.result.score,
        aiInsight: insight,
      });

      return c.json({
        ...toDisplayPayload(outcome.result),
        signals: summarizeSignals(outcome.signals),
        report: outcome.report
          ? { id: outcome.report.id, download_url: `/api/reports/${outcome.report.id}` }
          : null,
        ...(outcome.reportError ? { report_error: outcome.reportError } : {}),
      });
    } catch (err) {
      if (err instanceof ScanError) {
        recordScanOutcome(err.code, Date.now() - startedAt);
        log.info({ code: err.code, detail: err.message, filename_length: file.name.length }, 'Upload rejected');
        return c.json({ error: err.userMessage, code: err.code }, err.status);
      }
      throw err;
    }
  });

  return scans;
}
