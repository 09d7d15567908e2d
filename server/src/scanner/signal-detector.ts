/**
 * Section & signal detection.
 *
 * Every check is an independent pattern scan over the extracted text; the
 * result is a fully populated SignalSet (missing things are recorded as
 * false / 0 / empty, never omitted).
 */
import type { ScoringConfig } from '../lib/config.js';
import {
  CANONICAL_SECTIONS,
  type CanonicalSection,
  type FormattingIssue,
  type LengthBucket,
  type SignalSet,
} from './types.js';

export interface DetectOptions {
  /** Widens the keyword list with role-specific terms from the configuration. */
  jobTitle?: string;
}

// ─── Contact & dates ─────────────────────────────────────────────────

// Label lengths follow RFC 5321 limits so scans stay linear on long runs.
const EMAIL_RE = /[A-Za-z0-9._%+-]{1,64}@[A-Za-z0-9-]{1,63}(?:\.[A-Za-z0-9-]{1,63}){0,8}\.[A-Za-z]{2,24}/;
const PHONE_CANDIDATE_RE = /(?:\+\d{1,3}[\s.-]?)?\(?\d{2,4}\)?(?:[\s.-]?\d{2,4}){2,4}/g;
const PHONE_MIN_DIGITS = 10;
const PHONE_MAX_DIGITS = 15;

const MONTH = '(?:jan|feb|mar|apr|may|jun|jul|aug|sep|sept|oct|nov|dec)[a-z]*\\.?';
const YEAR = '(?:19|20)\\d{2}';
const DATE_PATTERNS = [
  new RegExp(`\\b${MONTH}\\s+${YEAR}\\b`, 'i'),
  new RegExp(`\\b${YEAR}\\s*(?:-|–|—|to)\\s*(?:${YEAR}|present|current|now)\\b`, 'i'),
  new RegExp(`\\b(?:0?[1-9]|1[0-2])/${YEAR}\\b`),
];

export function hasEmail(text: string): boolean {
  return EMAIL_RE.test(text);
}

export function hasPhone(text: string): boolean {
  for (const match of text.matchAll(PHONE_CANDIDATE_RE)) {
    const digits = match[0].replace(/\D/g, '').length;
    if (digits >= PHONE_MIN_DIGITS && digits <= PHONE_MAX_DIGITS) return true;
  }
  return false;
}

function hasDates(text: string): boolean {
  return DATE_PATTERNS.some((re) => re.test(text));
}

// ─── Section headings ────────────────────────────────────────────────

const HEADING_DECORATION_RE = /^[#*•\-–—=_\s]+|[\s.=_\-–—]+$/g;
const HEADING_JOINER_RE = /\s*(?:&|\/|,|\||\band\b)\s*/;
const MAX_HEADING_CHARS = 60;
// Longer labels are rejected before the decoration regex runs.
const MAX_RAW_HEADING_CHARS = MAX_HEADING_CHARS * 2;

function buildAliasIndex(config: ScoringConfig): Map<string, CanonicalSection> {
  const index = new Map<string, CanonicalSection>();
  for (const section of CANONICAL_SECTIONS) {
    for (const alias of config.section_aliases[section]) {
      index.set(alias.trim().toLowerCase().replace(/\s+/g, ' '), section);
    }
  }
  return index;
}

/**
 * Returns the canonical sections a line announces. A heading is a short line
 * (or the label before a colon) made only of known aliases, optionally joined
 * by "&", "and", "/", "," or "|".
 */
function headingSections(line: string, aliases: Map<string, CanonicalSection>): CanonicalSection[] {
  const raw = line.split(':')[0];
  if (raw.length > MAX_RAW_HEADING_CHARS) return [];

  const label = raw
    .replace(HEADING_DECORATION_RE, '')
    .toLowerCase()
    .replace(/\s+/g, ' ');
  if (!label || label.length > MAX_HEADING_CHARS) return [];

  const found: CanonicalSection[] = [];
  for (const part of label.split(HEADING_JOINER_RE)) {
    const section = aliases.get(part.trim());
    if (section) found.push(section);
  }
  return found;
}

// ─── Bullets ─────────────────────────────────────────────────────────

const BULLET_RE = /^(?:[-*]\s+|•\s*)\S/;
const MAX_ACTION_LINE_WORDS = 30;

function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function isBulletLine(line: string, actionVerbs: ReadonlySet<string>): boolean {
  if (BULLET_RE.test(line)) return true;
  // Short sentences that open with an action verb read as bullets once list glyphs are lost.
  if (!/^[A-Z]/.test(line) || countWords(line) > MAX_ACTION_LINE_WORDS) return false;
  const firstWord = line.split(/\s+/)[0].replace(/[^A-Za-z]/g, '').toLowerCase();
  return actionVerbs.has(firstWord);
}

// ─── Keywords ────────────────────────────────────────────────────────

interface KeywordMatcher {
  keyword: string;
  re: RegExp;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function buildKeywordMatcher(keyword: string): KeywordMatcher {
  const normalized = keyword.trim().toLowerCase();
  const body = normalized.split(/\s+/).map(escapeRegExp).join('\\s+');
  // Letter/digit lookarounds instead of \b so terms like "c++" and "node.js" still match.
  return { keyword: normalized, re: new RegExp(`(?<![a-z0-9])${body}(?![a-z0-9])`, 'gi') };
}

function countOccurrences(re: RegExp, text: string): number {
  let count = 0;
  for (const _match of text.matchAll(re)) count++;
  return count;
}

// ─── Formatting risk ─────────────────────────────────────────────────

const TABLE_ROW_RE = /\|.{0,40}\|/;
const TAB_CELLS_RE = /\t.*\t/;
const COLUMN_GAP_RE = /\S(?: {3,}|\t)\S/;
const NONSTANDARD_BULLET_RE = /^[▪■◆◇❖➢➤►▸→○●◦✓✔♦□☐]/;
const DECORATIVE_SYMBOL_RE = /[\u2600-\u27BF]|[\u{1F300}-\u{1FAFF}]/u;
const MULTI_COLUMN_MIN_LINES = 3;
const MULTI_COLUMN_MIN_SHARE = 0.15;

function detectFormattingIssues(lines: readonly string[]): FormattingIssue[] {
  const issues: FormattingIssue[] = [];

  if (lines.some((line) => TABLE_ROW_RE.test(line) || TAB_CELLS_RE.test(line))) {
    issues.push('table_layout');
  }

  // Column layouts survive extraction as wide gaps in the middle of many lines.
  const gapped = lines.filter((line) => COLUMN_GAP_RE.test(line)).length;
  if (gapped >= MULTI_COLUMN_MIN_LINES && gapped / lines.length >= MULTI_COLUMN_MIN_SHARE) {
    issues.push('multi_column');
  }

  if (lines.some((line) => NONSTANDARD_BULLET_RE.test(line))) {
    issues.push('nonstandard_bullets');
  }

  if (lines.some((line) => DECORATIVE_SYMBOL_RE.test(line))) {
    issues.push('decorative_symbols');
  }

  return issues;
}

// ─── Detector ────────────────────────────────────────────────────────

export class SignalDetector {
  private readonly aliases: Map<string, CanonicalSection>;
  private readonly actionVerbs: ReadonlySet<string>;
  private readonly keywords: readonly KeywordMatcher[];

  constructor(private readonly config: ScoringConfig) {
    this.aliases = buildAliasIndex(config);
    this.actionVerbs = new Set(config.action_verbs.map((verb) => verb.toLowerCase()));
    this.keywords = this.dedupe(config.keywords.map(buildKeywordMatcher));
  }

  /** Keyword matchers for a request, base list first, then role extensions. */
  private keywordsFor(jobTitle?: string): readonly KeywordMatcher[] {
    const title = jobTitle?.trim().toLowerCase();
    if (!title) return this.keywords;

    const extra: KeywordMatcher[] = [];
    for (const [role, terms] of Object.entries(this.config.role_keywords)) {
      if (buildKeywordMatcher(role).re.test(title)) {
        extra.push(...terms.map(buildKeywordMatcher));
      }
    }
    return extra.length > 0 ? this.dedupe([...this.keywords, ...extra]) : this.keywords;
  }

  detect(text: string, options: DetectOptions = {}): SignalSet {
    const lines = text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
    const flat = lines.join(' ').replace(/\s+/g, ' ');

    const sections: Record<CanonicalSection, boolean> = {
      summary: false,
      experience: false,
      education: false,
      skills: false,
      projects: false,
      certifications: false,
    };
    for (const line of lines) {
      for (const section of headingSections(line, this.aliases)) sections[section] = true;
    }

    const keywordHits: string[] = [];
    let keywordOccurrences = 0;
    for (const matcher of this.keywordsFor(options.jobTitle)) {
      const count = countOccurrences(matcher.re, flat);
      if (count > 0) {
        keywordHits.push(matcher.keyword);
        keywordOccurrences += count;
      }
    }

    const wordCount = countWords(flat);
    const formattingIssues = lines.length > 0 ? detectFormattingIssues(lines) : [];

    return Object.freeze({
      has_email: hasEmail(flat),
      has_phone: hasPhone(flat),
      has_dates: hasDates(flat),
      sections: Object.freeze(sections),
      section_count: CANONICAL_SECTIONS.filter((section) => sections[section]).length,
      bullet_count: lines.filter((line) => isBulletLine(line, this.actionVerbs)).length,
      keyword_hits: Object.freeze(keywordHits),
      keyword_occurrences: keywordOccurrences,
      word_count: wordCount,
      length_bucket: this.lengthBucket(wordCount),
      formatting_risk: formattingIssues.length > 0,
      formatting_issues: Object.freeze(formattingIssues),
    });
  }

  private lengthBucket(wordCount: number): LengthBucket {
    const { min_words: min, max_words: max } = this.config.rules.length;
    if (wordCount < min) return 'too_short';
    if (wordCount > max) return 'too_long';
    return 'ideal';
  }

  private dedupe(matchers: KeywordMatcher[]): KeywordMatcher[] {
    const seen = new Set<string>();
    return matchers.filter((matcher) => {
      if (seen.has(matcher.keyword)) return false;
      seen.add(matcher.keyword);
      return true;
    });
  }
}
