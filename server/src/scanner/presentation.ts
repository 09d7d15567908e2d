import type { FeedbackItem, FeedbackSeverity, ScoreResult, SignalSet } from './types.js';

export const SEVERITY_MARKERS: Readonly<Record<FeedbackSeverity, string>> = Object.freeze({
  positive: '✓',
  warning: '⚠',
  insight: '🧠',
});

export type ScoreBand = 'strong' | 'fair' | 'weak';

export function scoreBand(score: number): ScoreBand {
  if (score >= 70) return 'strong';
  if (score >= 50) return 'fair';
  return 'weak';
}

export function scoreVerdict(score: number): string {
  if (score >= 80) return 'Excellent ATS optimization';
  if (score >= 60) return 'Good but could be improved';
  return 'Needs significant improvements';
}

export interface DisplayFeedbackItem {
  severity: FeedbackSeverity;
  marker: string;
  message: string;
}

export interface DisplayPayload {
  score: number;
  band: ScoreBand;
  verdict: string;
  feedback: DisplayFeedbackItem[];
}

export function toDisplayItem(item: FeedbackItem): DisplayFeedbackItem {
  return { severity: item.severity, marker: SEVERITY_MARKERS[item.severity], message: item.message };
}

export function toDisplayPayload(result: ScoreResult): DisplayPayload {
  return {
    score: result.score,
    band: scoreBand(result.score),
    verdict: scoreVerdict(result.score),
    feedback: result.feedback.map(toDisplayItem),
  };
}

/** Subset of the signal set that is safe and useful to show next to the score. */
export function summarizeSignals(signals: SignalSet) {
  return {
    word_count: signals.word_count,
    length_bucket: signals.length_bucket,
    sections_found: Object.entries(signals.sections)
      .filter(([, found]) => found)
      .map(([section]) => section),
    bullet_count: signals.bullet_count,
    keyword_hits: [...signals.keyword_hits],
    has_email: signals.has_email,
    has_phone: signals.has_phone,
    has_dates: signals.has_dates,
    formatting_issues: [...signals.formatting_issues],
  };
}
