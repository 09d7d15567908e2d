import { describe, it, expect } from 'vitest';
import { loadScoringConfig } from '../lib/config.js';
import { ScoringEngine, clampScore } from '../scanner/scoring-engine.js';
import type { ScoringRule } from '../scanner/scoring-rules.js';
import { SignalDetector } from '../scanner/signal-detector.js';
import { STRONG_RESUME, WEAK_RESUME, makeSignals } from './fixtures/resumes.js';

const config = loadScoringConfig();
const engine = new ScoringEngine(config);
const detector = new SignalDetector(config);

describe('clampScore', () => {
  it('rounds to the nearest integer inside [0, 100]', () => {
    expect(clampScore(26.25)).toBe(26);
    expect(clampScore(99.5)).toBe(100);
    expect(clampScore(100.4)).toBe(100);
    expect(clampScore(-3)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(0);
  });
});

describe('ScoringEngine', () => {
  it('awards full marks and six positive items to a strong resume', () => {
    const result = engine.score(detector.detect(STRONG_RESUME));

    expect(result.score).toBe(100);
    expect(result.feedback).toEqual([
      { severity: 'positive', message: 'Contact information found' },
      { severity: 'positive', message: 'Good section structure' },
      { severity: 'positive', message: 'Strong use of bullet points' },
      { severity: 'positive', message: 'Strong keyword alignment' },
      { severity: 'positive', message: 'Resume length is appropriate' },
      { severity: 'positive', message: 'No risky formatting detected' },
    ]);
  });

  it('sums minimal partial credit for a weak resume', () => {
    const { result, breakdown } = engine.evaluate(detector.detect(WEAK_RESUME));

    expect(result.score).toBe(26);
    expect(breakdown.map((rule) => [rule.id, rule.points])).toEqual([
      ['contact', 0],
      ['sections', 0],
      ['bullets', 0],
      ['keywords', 6.25],
      ['length', 5],
      ['formatting', 15],
    ]);
    expect(result.feedback).toEqual([
      { severity: 'warning', message: 'Missing contact information' },
      {
        severity: 'warning',
        message: 'Consider adding missing sections: summary, experience, education, skills, projects, certifications',
      },
      { severity: 'warning', message: 'Add more bullet points for readability' },
      { severity: 'warning', message: 'Add more role-relevant keywords' },
      { severity: 'warning', message: 'Resume is too short (50 words)' },
      { severity: 'positive', message: 'No risky formatting detected' },
    ]);
  });

  it('names the missing contact detail when only one is absent', () => {
    const noPhone = engine.score(makeSignals({ has_phone: false }));
    expect(noPhone.feedback[0]).toEqual({ severity: 'warning', message: 'Missing contact information: phone number' });
    expect(noPhone.score).toBe(90);

    const noEmail = engine.score(makeSignals({ has_email: false }));
    expect(noEmail.feedback[0].message).toBe('Missing contact information: email address');
  });

  it('gives proportional credit for sections, bullets and keywords', () => {
    const { breakdown } = engine.evaluate(makeSignals({
      sections: {
        summary: false,
        experience: true,
        education: true,
        skills: false,
        projects: true,
        certifications: false,
      },
      section_count: 3,
      bullet_count: 2,
      keyword_hits: ['managed', 'python', 'sql'],
    }));

    expect(breakdown.find((rule) => rule.id === 'sections')?.points).toBe(15);
    expect(breakdown.find((rule) => rule.id === 'bullets')?.points).toBe(4);
    expect(breakdown.find((rule) => rule.id === 'keywords')?.points).toBe(9.38);
  });

  it('lists missing sections in canonical order', () => {
    const result = engine.score(makeSignals({
      sections: {
        summary: false,
        experience: true,
        education: false,
        skills: true,
        projects: false,
        certifications: false,
      },
      section_count: 2,
    }));
    expect(result.feedback[1].message).toBe('Consider adding missing sections: summary, education, projects, certifications');
  });

  it('reports long resumes and risky formatting as warnings', () => {
    const result = engine.score(makeSignals({
      word_count: 950,
      length_bucket: 'too_long',
      formatting_risk: true,
      formatting_issues: ['table_layout'],
    }));

    expect(result.score).toBe(75);
    expect(result.feedback[4]).toEqual({ severity: 'warning', message: 'Resume is too long (950 words)' });
    expect(result.feedback[5]).toEqual({ severity: 'warning', message: 'Avoid tables/multi-column layouts for ATS' });
  });

  it('never lowers the section score when a heading is added', () => {
    let previous = -1;
    for (let count = 0; count <= 6; count++) {
      const { breakdown } = engine.evaluate(makeSignals({ section_count: count }));
      const points = breakdown.find((rule) => rule.id === 'sections')?.points ?? -1;
      expect(points).toBeGreaterThanOrEqual(previous);
      previous = points;
    }
    expect(previous).toBe(20);
  });

  it('keeps the feedback order fixed whatever passes or fails', () => {
    const ids = (signals: ReturnType<typeof makeSignals>) =>
      engine.evaluate(signals).breakdown.map((rule) => rule.id);
    const expected = ['contact', 'sections', 'bullets', 'keywords', 'length', 'formatting'];

    expect(ids(makeSignals())).toEqual(expected);
    expect(ids(makeSignals({ has_email: false, bullet_count: 0, formatting_risk: true }))).toEqual(expected);
  });

  it('clamps totals that overshoot the scale', () => {
    const generous: ScoringRule[] = [
      { id: 'contact', evaluate: () => ({ passed: true, points: 70, message: 'a' }) },
      { id: 'sections', evaluate: () => ({ passed: true, points: 40, message: 'b' }) },
    ];
    expect(new ScoringEngine(config, generous).score(makeSignals()).score).toBe(100);

    const negative: ScoringRule[] = [
      { id: 'contact', evaluate: () => ({ passed: false, points: -12, message: 'c' }) },
    ];
    expect(new ScoringEngine(config, negative).score(makeSignals()).score).toBe(0);
  });

  it('returns frozen results and identical output for identical signals', () => {
    const signals = makeSignals({ bullet_count: 3 });
    const first = engine.score(signals);
    expect(engine.score(signals)).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.feedback)).toBe(true);
  });
});
