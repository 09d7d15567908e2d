import type { ScoringConfig } from '../lib/config.js';
import { SCORING_RULES, type RuleId, type ScoringRule } from './scoring-rules.js';
import type { FeedbackItem, ScoreResult, SignalSet } from './types.js';

export interface RuleScore {
  id: RuleId;
  passed: boolean;
  points: number;
}

export interface ScoreEvaluation {
  result: ScoreResult;
  breakdown: readonly RuleScore[];
}

/** Rounds and clamps a raw point total onto the 0-100 scale. */
export function clampScore(raw: number): number {
  if (!Number.isFinite(raw)) return 0;
  return Math.min(100, Math.max(0, Math.round(raw)));
}

/**
 * Applies the weighted rule table to a signal set. The configuration is
 * injected once and never mutated, so one engine serves concurrent scans.
 */
export class ScoringEngine {
  constructor(
    private readonly config: ScoringConfig,
    private readonly rules: readonly ScoringRule[] = SCORING_RULES,
  ) {}

  score(signals: SignalSet): ScoreResult {
    return this.evaluate(signals).result;
  }

  evaluate(signals: SignalSet): ScoreEvaluation {
    const feedback: FeedbackItem[] = [];
    const breakdown: RuleScore[] = [];
    let total = 0;

    for (const rule of this.rules) {
      const outcome = rule.evaluate(signals, this.config.rules);
      total += outcome.points;
      breakdown.push(Object.freeze({
        id: rule.id,
        passed: outcome.passed,
        points: Math.round(outcome.points * 100) / 100,
      }));
      feedback.push(Object.freeze({
        severity: outcome.passed ? 'positive' : 'warning',
        message: outcome.message,
      }));
    }

    return {
      result: Object.freeze({ score: clampScore(total), feedback: Object.freeze(feedback) }),
      breakdown: Object.freeze(breakdown),
    };
  }
}
