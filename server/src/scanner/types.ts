// ─── Documents ───────────────────────────────────────────────────────

export type DocumentFormat = 'pdf' | 'docx';

/** Raw upload as handed over by the service layer. */
export interface ResumeDocument {
  readonly bytes: Uint8Array;
  readonly format: DocumentFormat;
}

export interface ExtractedText {
  /** Visible text, whitespace collapsed to single spaces. */
  readonly text: string;
  /** Non-empty lines in document order, trimmed but with inner spacing kept. */
  readonly lines: readonly string[];
}

// ─── Signals ─────────────────────────────────────────────────────────

export const CANONICAL_SECTIONS = [
  'summary',
  'experience',
  'education',
  'skills',
  'projects',
  'certifications',
] as const;

export type CanonicalSection = typeof CANONICAL_SECTIONS[number];

export type LengthBucket = 'too_short' | 'ideal' | 'too_long';

export type FormattingIssue =
  | 'table_layout'
  | 'multi_column'
  | 'nonstandard_bullets'
  | 'decorative_symbols';

export interface SignalSet {
  readonly has_email: boolean;
  readonly has_phone: boolean;
  readonly has_dates: boolean;
  readonly sections: Readonly<Record<CanonicalSection, boolean>>;
  readonly section_count: number;
  readonly bullet_count: number;
  /** Distinct matched keywords, in configuration order. */
  readonly keyword_hits: readonly string[];
  readonly keyword_occurrences: number;
  readonly word_count: number;
  readonly length_bucket: LengthBucket;
  readonly formatting_risk: boolean;
  readonly formatting_issues: readonly FormattingIssue[];
}

// ─── Scoring output ──────────────────────────────────────────────────

export type FeedbackSeverity = 'positive' | 'warning' | 'insight';

export interface FeedbackItem {
  readonly severity: FeedbackSeverity;
  readonly message: string;
}

export interface ScoreResult {
  /** Integer in [0, 100]. */
  readonly score: number;
  readonly feedback: readonly FeedbackItem[];
}

// ─── Reports ─────────────────────────────────────────────────────────

export interface RenderedReport {
  readonly content: Buffer;
  readonly pageCount: number;
  readonly score: number;
  /** Feedback in order, each message as it was drawn after reduction to the report font. */
  readonly entries: readonly FeedbackItem[];
}

export interface StoredReport {
  readonly id: string;
  readonly filename: string;
}
