/** Windows-1252 code points above U+00FF that the standard PDF fonts can draw. */
const WINANSI_ABOVE_FF = new Set([
  '\u20AC', '\u201A', '\u0192', '\u201E', '\u2026', '\u2020', '\u2021',
  '\u02C6', '\u2030', '\u0160', '\u2039', '\u0152', '\u017D',
  '\u2018', '\u2019', '\u201C', '\u201D', '\u2022', '\u2013', '\u2014',
  '\u02DC', '\u2122', '\u0161', '\u203A', '\u0153', '\u017E', '\u0178',
]);

/**
 * Reduces one paragraph of text to what the standard (WinAnsi) fonts can render:
 * common typographic punctuation is kept, other characters are decomposed or dropped.
 */
export function sanitizePdfText(input: string): string {
  return input
    .replace(/\s+/g, ' ')
    // Bullet-like glyphs outside WinAnsi collapse to the standard bullet
    .replace(/[\u2023\u25AA\u25CF\u25E6\u2043\u00B7\u2027\u27A2\u27A4\u25BA]/g, '\u2022')
    // Arrows have no WinAnsi form
    .replace(/[\u2192\u21D2\u279D]/g, '->')
    // Prime / double-prime → ASCII (not in WinAnsi)
    .replace(/\u2032/g, "'")
    .replace(/\u2033/g, '"')
    // Modifier apostrophe → right single quote (WinAnsi)
    .replace(/\u02BC/g, '\u2019')
    .replace(/\u00A0/g, ' ')
    // Anything else outside Latin-1 is decomposed; leftovers are dropped.
    .replace(/[^\x00-\xFF]/g, (ch) => {
      if (WINANSI_ABOVE_FF.has(ch)) return ch;
      const normalized = ch.normalize('NFKD').replace(/[^\x00-\xFF]/g, '');
      return normalized || '';
    })
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F\u200B-\u200F\u2028\u2029\uFEFF]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

/** Drawn in place of a paragraph that has nothing left after sanitizing. */
export const UNDRAWABLE_TEXT_NOTE = '[Text not shown: the report font cannot display these characters]';
/** Appended when sanitizing dropped letters or digits from a paragraph. */
export const PARTIAL_TEXT_MARK = '[...]';

const LETTER_OR_DIGIT_RE = /[\p{L}\p{N}]/gu;

function countLettersAndDigits(text: string): number {
  return text.match(LETTER_OR_DIGIT_RE)?.length ?? 0;
}

/**
 * sanitizePdfText for report entries: a paragraph never vanishes and never
 * loses words without a visible mark.
 */
export function toDrawableParagraph(input: string): string {
  const sanitized = sanitizePdfText(input);
  if (!sanitized) return UNDRAWABLE_TEXT_NOTE;
  return countLettersAndDigits(sanitized) < countLettersAndDigits(input)
    ? `${sanitized} ${PARTIAL_TEXT_MARK}`
    : sanitized;
}

/** Non-blank paragraphs of a message as the report draws them; never empty. */
export function drawableParagraphs(message: string): string[] {
  const paragraphs = message
    .split('\n')
    .filter((paragraph) => paragraph.trim().length > 0)
    .map(toDrawableParagraph);
  return paragraphs.length > 0 ? paragraphs : [UNDRAWABLE_TEXT_NOTE];
}
