import { jsPDF } from 'jspdf';
import { RenderFailureError, errorMessage } from '../lib/errors.js';
import { drawableParagraphs } from './pdf-text.js';
import { scoreBand, scoreVerdict, type ScoreBand } from './presentation.js';
import type { FeedbackItem, FeedbackSeverity, RenderedReport, ScoreResult } from './types.js';

type Rgb = [number, number, number];

export const REPORT_TITLE = 'ATS Resume Evaluation Report';
export const REPORT_FOOTER = 'Generated by ATS Resume Scanner';

// A4 in points.
const PAGE_WIDTH = 595.28;
const PAGE_HEIGHT = 841.89;
const MARGIN_X = 50;
const MARGIN_TOP = 56;
const MARGIN_BOTTOM = 60;
const CONTENT_WIDTH = PAGE_WIDTH - MARGIN_X * 2;

const HEADER_HEIGHT = 72;
const SCORE_BAR_WIDTH = 420;
const SCORE_BAR_HEIGHT = 12;
const MARKER_INDENT = 18;
const LINE_HEIGHT = 14;
const ITEM_GAP = 6;

const BRAND: Rgb = [59, 89, 152];
const BAR_OUTLINE: Rgb = [200, 200, 200];
const FOOTER_GRAY: Rgb = [150, 150, 150];

const BAND_COLORS: Record<ScoreBand, Rgb> = {
  strong: [0, 128, 0],
  fair: [230, 140, 0],
  weak: [200, 30, 30],
};

const SEVERITY_COLORS: Record<FeedbackSeverity, Rgb> = {
  positive: [0, 128, 0],
  warning: [204, 120, 0],
  insight: [40, 40, 40],
};

const MARKER_COLORS: Record<FeedbackSeverity, Rgb> = {
  positive: [0, 128, 0],
  warning: [230, 140, 0],
  insight: BRAND,
};

/**
 * Severity markers are drawn as vector shapes; the standard fonts carry no
 * check mark, warning sign or emoji.
 */
function drawMarker(doc: jsPDF, severity: FeedbackSeverity, x: number, baseline: number): void {
  const [r, g, b] = MARKER_COLORS[severity];
  if (severity === 'positive') {
    doc.setDrawColor(r, g, b);
    doc.setLineWidth(1.6);
    doc.line(x, baseline - 4, x + 3, baseline - 1);
    doc.line(x + 3, baseline - 1, x + 9, baseline - 8);
    doc.setLineWidth(1);
  } else if (severity === 'warning') {
    doc.setFillColor(r, g, b);
    doc.triangle(x + 4.5, baseline - 9, x, baseline, x + 9, baseline, 'F');
  } else {
    doc.setFillColor(r, g, b);
    doc.circle(x + 4.5, baseline - 4, 3.5, 'F');
  }
}

function buildDocument(result: ScoreResult): { doc: jsPDF; entries: FeedbackItem[] } {
  const doc = new jsPDF({ orientation: 'portrait', unit: 'pt', format: 'a4' });
  doc.setProperties({ title: REPORT_TITLE, creator: 'ATS Resume Scanner' });

  // Header band
  doc.setFillColor(...BRAND);
  doc.rect(0, 0, PAGE_WIDTH, HEADER_HEIGHT, 'F');
  doc.setTextColor(255, 255, 255);
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(20);
  doc.text(REPORT_TITLE, PAGE_WIDTH / 2, 44, { align: 'center' });

  // Score
  const bandColor = BAND_COLORS[scoreBand(result.score)];
  let y = HEADER_HEIGHT + 60;
  doc.setTextColor(...bandColor);
  doc.setFontSize(40);
  doc.text(`${result.score}/100`, PAGE_WIDTH / 2, y, { align: 'center' });
  y += 24;

  doc.setFont('helvetica', 'normal');
  doc.setFontSize(12);
  doc.setTextColor(60, 60, 60);
  doc.text(scoreVerdict(result.score), PAGE_WIDTH / 2, y, { align: 'center' });
  y += 16;

  const barX = (PAGE_WIDTH - SCORE_BAR_WIDTH) / 2;
  doc.setDrawColor(...BAR_OUTLINE);
  doc.rect(barX, y, SCORE_BAR_WIDTH, SCORE_BAR_HEIGHT, 'S');
  if (result.score > 0) {
    doc.setFillColor(...bandColor);
    doc.rect(barX, y, SCORE_BAR_WIDTH * (result.score / 100), SCORE_BAR_HEIGHT, 'F');
  }
  y += SCORE_BAR_HEIGHT + 36;

  // Feedback
  doc.setFont('helvetica', 'bold');
  doc.setFontSize(14);
  doc.setTextColor(...BRAND);
  doc.text('Detailed Feedback', MARGIN_X, y);
  y += 6;
  doc.setDrawColor(...BRAND);
  doc.line(MARGIN_X, y, PAGE_WIDTH - MARGIN_X, y);
  y += 22;

  doc.setFont('helvetica', 'normal');
  doc.setFontSize(10);

  const ensureRoom = (height: number) => {
    if (y + height <= PAGE_HEIGHT - MARGIN_BOTTOM) return;
    doc.addPage();
    y = MARGIN_TOP;
  };

  const entries: FeedbackItem[] = [];
  for (const item of result.feedback) {
    // Every item gets at least one line, so its marker is always drawn.
    const paragraphs = drawableParagraphs(item.message);
    entries.push(Object.freeze({ severity: item.severity, message: paragraphs.join('\n') }));
    const wrapped = paragraphs
      .flatMap((paragraph): string[] => doc.splitTextToSize(paragraph, CONTENT_WIDTH - MARKER_INDENT));

    wrapped.forEach((line, index) => {
      ensureRoom(LINE_HEIGHT);
      if (index === 0) drawMarker(doc, item.severity, MARGIN_X, y);
      doc.setTextColor(...SEVERITY_COLORS[item.severity]);
      doc.text(line, MARGIN_X + MARKER_INDENT, y);
      y += LINE_HEIGHT;
    });
    y += ITEM_GAP;
  }

  // Footer on every page
  const pageCount = doc.getNumberOfPages();
  for (let page = 1; page <= pageCount; page++) {
    doc.setPage(page);
    doc.setFont('helvetica', 'italic');
    doc.setFontSize(8);
    doc.setTextColor(...FOOTER_GRAY);
    const footer = pageCount > 1 ? `${REPORT_FOOTER} - page ${page} of ${pageCount}` : REPORT_FOOTER;
    doc.text(footer, PAGE_WIDTH / 2, PAGE_HEIGHT - 24, { align: 'center' });
  }

  return { doc, entries };
}

/**
 * Lays a ScoreResult out as a paginated PDF. Pure formatting: the score and
 * every feedback item are reproduced in order. Text the standard fonts cannot
 * draw is replaced by a visible note, and `entries` carries what was drawn.
 */
export function renderReport(result: ScoreResult): RenderedReport {
  try {
    const { doc, entries } = buildDocument(result);
    const content = Buffer.from(doc.output('arraybuffer'));
    return Object.freeze({
      content,
      pageCount: doc.getNumberOfPages(),
      score: result.score,
      entries: Object.freeze(entries),
    });
  } catch (err) {
    throw new RenderFailureError(`PDF rendering failed: ${errorMessage(err)}`, err);
  }
}
