import { describe, it, expect } from 'vitest';
import { SEVERITY_MARKERS, scoreBand, scoreVerdict, summarizeSignals, toDisplayPayload } from '../scanner/presentation.js';
import { makeSignals } from './fixtures/resumes.js';

describe('score bands', () => {
  it('splits scores at 70 and 50', () => {
    expect(scoreBand(100)).toBe('strong');
    expect(scoreBand(70)).toBe('strong');
    expect(scoreBand(69)).toBe('fair');
    expect(scoreBand(50)).toBe('fair');
    expect(scoreBand(49)).toBe('weak');
  });

  it('uses the report verdict thresholds', () => {
    expect(scoreVerdict(80)).toBe('Excellent ATS optimization');
    expect(scoreVerdict(79)).toBe('Good but could be improved');
    expect(scoreVerdict(60)).toBe('Good but could be improved');
    expect(scoreVerdict(59)).toBe('Needs significant improvements');
  });
});

describe('toDisplayPayload', () => {
  it('attaches a marker to every feedback item in order', () => {
    const payload = toDisplayPayload({
      score: 55,
      feedback: [
        { severity: 'warning', message: 'Add contact information' },
        { severity: 'positive', message: 'Good formatting' },
        { severity: 'insight', message: '- Quantify results' },
      ],
    });

    expect(payload).toEqual({
      score: 55,
      band: 'fair',
      verdict: 'Needs significant improvements',
      feedback: [
        { severity: 'warning', marker: SEVERITY_MARKERS.warning, message: 'Add contact information' },
        { severity: 'positive', marker: SEVERITY_MARKERS.positive, message: 'Good formatting' },
        { severity: 'insight', marker: SEVERITY_MARKERS.insight, message: '- Quantify results' },
      ],
    });
  });
});

describe('summarizeSignals', () => {
  it('lists found sections and copies the arrays', () => {
    const signals = makeSignals({ formatting_issues: ['table_layout'], formatting_risk: true });
    const summary = summarizeSignals(signals);

    expect(summary.sections_found).toEqual(['summary', 'experience', 'education', 'skills']);
    expect(summary.formatting_issues).toEqual(['table_layout']);
    expect(summary.keyword_hits).not.toBe(signals.keyword_hits);
    expect(summary.keyword_hits).toEqual(signals.keyword_hits);
  });
});
