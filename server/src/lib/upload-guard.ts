import type { Context } from 'hono';

// Multipart framing and the small text fields ride on top of the file itself.
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

export function uploadTooLargeMessage(maxBytes: number): string {
  return `File too large (max ${maxBytes} bytes)`;
}

/**
 * Rejects a request up front when its declared Content-Length cannot fit a
 * file of `maxBytes`. The file size is checked again after parsing since the
 * header may be absent.
 */
export function rejectOversizedUpload(c: Context, maxBytes: number): Response | null {
  const contentLength = c.req.header('content-length');
  if (!contentLength) return null;
  const parsed = Number.parseInt(contentLength, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return null;
  if (parsed <= maxBytes + MULTIPART_OVERHEAD_BYTES) return null;
  return c.json({ error: uploadTooLargeMessage(maxBytes), code: 'UPLOAD_TOO_LARGE' }, 413);
}

/** File extension (".pdf") when the name has one, otherwise the declared MIME type. */
export function formatHintFor(file: { name: string; type: string }): string {
  const name = file.name.trim();
  const dot = name.lastIndexOf('.');
  if (dot > 0 && dot < name.length - 1) return name.slice(dot).toLowerCase();
  return file.type;
}
