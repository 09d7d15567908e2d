export type ScanErrorCode =
  | 'UNSUPPORTED_FORMAT'
  | 'CORRUPT_DOCUMENT'
  | 'EMPTY_DOCUMENT'
  | 'AI_SERVICE_UNAVAILABLE'
  | 'RENDER_FAILURE';

/**
 * Base class for failures the scan pipeline knows how to describe to a user.
 * `userMessage` is safe to return over HTTP; `message` may carry parser detail.
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;
  readonly status: 415 | 422 | 500 | 503;
  readonly userMessage: string;

  constructor(
    code: ScanErrorCode,
    status: 415 | 422 | 500 | 503,
    userMessage: string,
    options?: { detail?: string; cause?: unknown },
  ) {
    super(options?.detail ?? userMessage, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.userMessage = userMessage;
  }
}

export class UnsupportedFormatError extends ScanError {
  constructor(hint: string) {
    super(
      'UNSUPPORTED_FORMAT',
      415,
      'Only PDF and DOCX files are supported.',
      { detail: `Unsupported document format: ${hint || '(none)'}` },
    );
  }
}

export class CorruptDocumentError extends ScanError {
  constructor(detail: string, cause?: unknown) {
    super(
      'CORRUPT_DOCUMENT',
      422,
      'The file could not be read. It may be damaged or not a real PDF/DOCX document.',
      { detail, cause },
    );
  }
}

export class EmptyDocumentError extends ScanError {
  constructor() {
    super(
      'EMPTY_DOCUMENT',
      422,
      'No readable text was found in the document. Scanned or image-only resumes cannot be analyzed.',
    );
  }
}

export class AiServiceUnavailableError extends ScanError {
  constructor(detail: string, cause?: unknown) {
    super('AI_SERVICE_UNAVAILABLE', 503, 'AI suggestions are currently unavailable.', { detail, cause });
  }
}

export class RenderFailureError extends ScanError {
  constructor(detail: string, cause?: unknown) {
    super('RENDER_FAILURE', 500, 'The downloadable report could not be generated.', { detail, cause });
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
