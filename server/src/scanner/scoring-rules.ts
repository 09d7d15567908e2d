import type { RuleWeights } from '../lib/config.js';
import { CANONICAL_SECTIONS, type SignalSet } from './types.js';

export type RuleId = 'contact' | 'sections' | 'bullets' | 'keywords' | 'length' | 'formatting';

export interface RuleEvaluation {
  passed: boolean;
  points: number;
  message: string;
}

/**
 * One row of the rule table. A passing rule emits a positive item, a failing
 * one a warning; rules never read each other's outcome.
 */
export interface ScoringRule {
  id: RuleId;
  evaluate(signals: SignalSet, weights: RuleWeights): RuleEvaluation;
}

function proportional(value: number, target: number, weight: number): number {
  return Math.min(value / target, 1) * weight;
}

const contactRule: ScoringRule = {
  id: 'contact',
  evaluate({ has_email, has_phone }, { contact }) {
    if (has_email && has_phone) {
      return { passed: true, points: contact.weight, message: 'Contact information found' };
    }
    const missing: string[] = [];
    if (!has_email) missing.push('email address');
    if (!has_phone) missing.push('phone number');
    return {
      passed: false,
      points: 0,
      message: missing.length > 1
        ? 'Missing contact information'
        : `Missing contact information: ${missing[0]}`,
    };
  },
};

const sectionsRule: ScoringRule = {
  id: 'sections',
  evaluate({ sections, section_count }, { sections: rule }) {
    if (section_count >= rule.target) {
      return { passed: true, points: rule.weight, message: 'Good section structure' };
    }
    const missing = CANONICAL_SECTIONS.filter((section) => !sections[section]);
    return {
      passed: false,
      points: proportional(section_count, rule.target, rule.weight),
      message: `Consider adding missing sections: ${missing.join(', ')}`,
    };
  },
};

const bulletsRule: ScoringRule = {
  id: 'bullets',
  evaluate({ bullet_count }, { bullets }) {
    if (bullet_count >= bullets.target) {
      return { passed: true, points: bullets.weight, message: 'Strong use of bullet points' };
    }
    return {
      passed: false,
      points: proportional(bullet_count, bullets.target, bullets.partial_weight),
      message: 'Add more bullet points for readability',
    };
  },
};

const keywordsRule: ScoringRule = {
  id: 'keywords',
  evaluate({ keyword_hits }, { keywords }) {
    if (keyword_hits.length >= keywords.target) {
      return { passed: true, points: keywords.weight, message: 'Strong keyword alignment' };
    }
    return {
      passed: false,
      points: proportional(keyword_hits.length, keywords.target, keywords.weight),
      message: 'Add more role-relevant keywords',
    };
  },
};

const lengthRule: ScoringRule = {
  id: 'length',
  evaluate({ length_bucket, word_count }, { length }) {
    if (length_bucket === 'ideal') {
      return { passed: true, points: length.weight, message: 'Resume length is appropriate' };
    }
    const direction = length_bucket === 'too_short' ? 'short' : 'long';
    return {
      passed: false,
      points: length.fallback_weight,
      message: `Resume is too ${direction} (${word_count} words)`,
    };
  },
};

const formattingRule: ScoringRule = {
  id: 'formatting',
  evaluate({ formatting_risk }, { formatting }) {
    if (!formatting_risk) {
      return { passed: true, points: formatting.weight, message: 'No risky formatting detected' };
    }
    return { passed: false, points: 0, message: 'Avoid tables/multi-column layouts for ATS' };
  },
};

/** Evaluation order is also feedback order. */
export const SCORING_RULES: readonly ScoringRule[] = Object.freeze([
  contactRule,
  sectionsRule,
  bulletsRule,
  keywordsRule,
  lengthRule,
  formattingRule,
]);
