import mammoth from 'mammoth';
import { PDFParse } from 'pdf-parse';
import {
  CorruptDocumentError,
  EmptyDocumentError,
  UnsupportedFormatError,
  errorMessage,
} from '../lib/errors.js';
import logger from '../lib/logger.js';
import type { DocumentFormat, ExtractedText, ResumeDocument } from './types.js';

const DOCX_MIME = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document';

const FORMAT_ALIASES: Record<string, DocumentFormat> = {
  pdf: 'pdf',
  '.pdf': 'pdf',
  'application/pdf': 'pdf',
  docx: 'docx',
  '.docx': 'docx',
  [DOCX_MIME]: 'docx',
};

/**
 * Maps a format hint (extension, bare format name or MIME type) to a supported format.
 * Returns null for anything that is not PDF or DOCX.
 */
export function resolveDocumentFormat(hint: string | null | undefined): DocumentFormat | null {
  const key = (hint ?? '').trim().toLowerCase();
  return Object.hasOwn(FORMAT_ALIASES, key) ? FORMAT_ALIASES[key] : null;
}

export function createResumeDocument(bytes: Uint8Array, formatHint: string): ResumeDocument {
  const format = resolveDocumentFormat(formatHint);
  if (!format) throw new UnsupportedFormatError(formatHint);
  return Object.freeze({ bytes, format });
}

// ─── Container sniffing ──────────────────────────────────────────────

const PDF_MAGIC = [0x25, 0x50, 0x44, 0x46, 0x2d]; // %PDF-
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04]; // PK\x03\x04
// Some producers emit a short preamble before the PDF header.
const PDF_HEADER_SEARCH_BYTES = 1024;

function startsWithAt(bytes: Uint8Array, magic: number[], offset: number): boolean {
  if (offset + magic.length > bytes.length) return false;
  return magic.every((byte, i) => bytes[offset + i] === byte);
}

function hasContainerSignature(doc: ResumeDocument): boolean {
  if (doc.format === 'docx') return startsWithAt(doc.bytes, ZIP_MAGIC, 0);
  const limit = Math.min(doc.bytes.length, PDF_HEADER_SEARCH_BYTES);
  for (let offset = 0; offset < limit; offset++) {
    if (startsWithAt(doc.bytes, PDF_MAGIC, offset)) return true;
  }
  return false;
}

// ─── Parsers ─────────────────────────────────────────────────────────

async function readPdfPages(bytes: Uint8Array): Promise<string[]> {
  // pdf.js may detach the buffer it is given, so hand it a private copy.
  const parser = new PDFParse({ data: new Uint8Array(bytes) });
  try {
    const result = await parser.getText();
    return [...result.pages]
      .sort((a, b) => a.num - b.num)
      .map((page) => page.text);
  } finally {
    await parser.destroy();
  }
}

async function readDocxText(bytes: Uint8Array): Promise<string> {
  // Raw text keeps paragraph order; table cells come out row by row.
  const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) });
  return result.value;
}

// ─── Normalization ───────────────────────────────────────────────────

const LINE_BREAK_RE = /\r\n|[\r\n\f\v\u2028\u2029]/;
const INVISIBLE_RE = /[\u200B-\u200D\u2060\uFEFF\u00AD]/g;
const SPACE_VARIANTS_RE = /[\u00A0\u2000-\u200A\u202F\u205F\u3000]/g;

export function normalizeExtractedText(raw: string): ExtractedText {
  const lines = raw
    .split(LINE_BREAK_RE)
    .map((line) => line.replace(INVISIBLE_RE, '').replace(SPACE_VARIANTS_RE, ' ').trim())
    .filter((line) => line.length > 0);
  const text = lines.join(' ').replace(/\s+/g, ' ').trim();
  return Object.freeze({ text, lines: Object.freeze(lines) });
}

/**
 * Converts an uploaded resume into normalized plain text.
 * Throws CorruptDocumentError when the bytes cannot be parsed and
 * EmptyDocumentError when parsing succeeds but no visible text remains.
 */
export async function extractText(doc: ResumeDocument): Promise<ExtractedText> {
  if (!hasContainerSignature(doc)) {
    throw new CorruptDocumentError(`Byte stream does not look like a ${doc.format.toUpperCase()} file`);
  }

  let raw: string;
  try {
    raw = doc.format === 'pdf'
      ? (await readPdfPages(doc.bytes)).join('\n')
      : await readDocxText(doc.bytes);
  } catch (err) {
    logger.debug({ format: doc.format, error: errorMessage(err) }, 'Document parser failed');
    throw new CorruptDocumentError(`${doc.format.toUpperCase()} extraction failed: ${errorMessage(err)}`, err);
  }

  const extracted = normalizeExtractedText(raw);
  if (!extracted.text) {
    throw new EmptyDocumentError();
  }

  logger.debug(
    { format: doc.format, bytes: doc.bytes.length, lines: extracted.lines.length, chars: extracted.text.length },
    'Text extraction completed',
  );
  return extracted;
}
