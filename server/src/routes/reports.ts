import { Hono } from 'hono';
import { REPORT_DOWNLOAD_NAME, isReportId, type ReportStore } from '../scanner/report-store.js';

export function createReportRoutes(store: ReportStore) {
  const reports = new Hono();

  // GET /api/reports/:id: download a previously generated report
  reports.get('/:id', async (c) => {
    const id = c.req.param('id');
    if (!isReportId(id)) return c.json({ error: 'Invalid report id', code: 'INVALID_REQUEST' }, 400);

    const content = await store.read(id);
    if (!content) return c.json({ error: 'Report not found', code: 'NOT_FOUND' }, 404);

    const body = new ArrayBuffer(content.length);
    new Uint8Array(body).set(content);

    c.header('Content-Type', 'application/pdf');
    c.header('Content-Disposition', `attachment; filename="${REPORT_DOWNLOAD_NAME}"`);
    c.header('Cache-Control', 'private, no-store');
    return c.body(body);
  });

  return reports;
}
