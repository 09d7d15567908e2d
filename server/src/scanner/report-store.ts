import { randomUUID } from 'node:crypto';
import { mkdir, open, readFile, rename, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import { errorMessage } from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { RenderedReport, StoredReport } from './types.js';

const REPORT_ID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export const REPORT_DOWNLOAD_NAME = 'ATS_Resume_Report.pdf';

export function isReportId(value: string): boolean {
  return REPORT_ID_RE.test(value);
}

/**
 * Storage collaborator for rendered reports. The scanner hands over an
 * artifact and gets back an opaque id; retention is someone else's problem.
 */
export interface ReportStore {
  persist(report: RenderedReport): Promise<StoredReport>;
  /** Resolves to null when no report with that id exists. */
  read(id: string): Promise<Buffer | null>;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

export class FileReportStore implements ReportStore {
  private ready: Promise<unknown> | null = null;

  constructor(private readonly dir: string) {}

  async persist(report: RenderedReport): Promise<StoredReport> {
    await this.ensureDir();
    const id = randomUUID();
    const filename = `${id}.pdf`;
    const finalPath = join(this.dir, filename);
    const tmpPath = `${finalPath}.tmp`;

    try {
      const handle = await open(tmpPath, 'wx');
      try {
        await handle.writeFile(report.content);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, finalPath);
    } catch (err) {
      await unlink(tmpPath).catch((cleanupErr: unknown) => {
        if (isErrnoException(cleanupErr) && cleanupErr.code === 'ENOENT') return;
        logger.warn({ path: tmpPath, error: errorMessage(cleanupErr) }, 'Failed to remove partial report file');
      });
      throw err;
    }

    logger.debug({ id, bytes: report.content.length, pages: report.pageCount }, 'Report persisted');
    return Object.freeze({ id, filename });
  }

  async read(id: string): Promise<Buffer | null> {
    if (!isReportId(id)) return null;
    try {
      return await readFile(join(this.dir, `${id}.pdf`));
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return null;
      throw err;
    }
  }

  private ensureDir(): Promise<unknown> {
    if (!this.ready) {
      this.ready = mkdir(this.dir, { recursive: true }).catch((err: unknown) => {
        this.ready = null;
        throw err;
      });
    }
    return this.ready;
  }
}
