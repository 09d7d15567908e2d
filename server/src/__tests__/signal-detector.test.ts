import { describe, it, expect } from 'vitest';
import { loadScoringConfig } from '../lib/config.js';
import { SignalDetector, hasEmail, hasPhone } from '../scanner/signal-detector.js';
import { STRONG_RESUME, STRONG_RESUME_KEYWORDS, WEAK_RESUME, filler } from './fixtures/resumes.js';

const detector = new SignalDetector(loadScoringConfig());

describe('contact detection', () => {
  it('recognizes email addresses', () => {
    expect(hasEmail('reach me at a.b+c@mail.example.org today')).toBe(true);
    expect(hasEmail('not an address: jordan@localhost')).toBe(false);
  });

  it('stays fast on long runs that are not an address', () => {
    expect(hasEmail(`${'a'.repeat(100_000)}@${'b.'.repeat(50_000)}`)).toBe(false);
    expect(hasEmail('x'.repeat(200_000))).toBe(false);
  }, 2_000);

  it('recognizes phone numbers with common separators', () => {
    expect(hasPhone('(555) 123-4567')).toBe(true);
    expect(hasPhone('+44 20 7946 0958')).toBe(true);
    expect(hasPhone('555.123.4567')).toBe(true);
  });

  it('ignores digit runs that are too short to be a phone number', () => {
    expect(hasPhone('Order 12345 shipped')).toBe(false);
    expect(hasPhone('2019 - 2021')).toBe(false);
  });
});

describe('SignalDetector.detect', () => {
  it('reports every signal of a well-structured resume', () => {
    const signals = detector.detect(STRONG_RESUME);

    expect(signals.has_email).toBe(true);
    expect(signals.has_phone).toBe(true);
    expect(signals.has_dates).toBe(false);
    expect(signals.sections).toEqual({
      summary: true,
      experience: true,
      education: true,
      skills: true,
      projects: false,
      certifications: false,
    });
    expect(signals.section_count).toBe(4);
    expect(signals.bullet_count).toBe(10);
    expect(signals.keyword_hits).toEqual(STRONG_RESUME_KEYWORDS);
    expect(signals.keyword_occurrences).toBe(10);
    expect(signals.word_count).toBe(400);
    expect(signals.length_bucket).toBe('ideal');
    expect(signals.formatting_risk).toBe(false);
    expect(signals.formatting_issues).toEqual([]);
  });

  it('records absent signals instead of omitting them', () => {
    const signals = detector.detect(WEAK_RESUME);

    expect(signals).toEqual({
      has_email: false,
      has_phone: false,
      has_dates: false,
      sections: {
        summary: false,
        experience: false,
        education: false,
        skills: false,
        projects: false,
        certifications: false,
      },
      section_count: 0,
      bullet_count: 0,
      keyword_hits: ['python', 'excel'],
      keyword_occurrences: 2,
      word_count: 50,
      length_bucket: 'too_short',
      formatting_risk: false,
      formatting_issues: [],
    });
  });

  it('returns a frozen, deterministic signal set', () => {
    const first = detector.detect(STRONG_RESUME);
    const second = detector.detect(STRONG_RESUME);
    expect(second).toEqual(first);
    expect(Object.isFrozen(first)).toBe(true);
    expect(Object.isFrozen(first.sections)).toBe(true);
  });

  it('finds dates in month-year, range and numeric forms', () => {
    expect(detector.detect('Analyst, Jan 2020').has_dates).toBe(true);
    expect(detector.detect('Engineer 2018 – Present').has_dates).toBe(true);
    expect(detector.detect('Intern 06/2017').has_dates).toBe(true);
    expect(detector.detect('Team of 2000 people').has_dates).toBe(false);
  });
});

describe('section headings', () => {
  it('matches headings case-insensitively with decoration and a trailing colon', () => {
    const signals = detector.detect(['## Professional Summary', 'WORK EXPERIENCE:', 'Projects'].join('\n'));
    expect(signals.sections.summary).toBe(true);
    expect(signals.sections.experience).toBe(true);
    expect(signals.sections.projects).toBe(true);
    expect(signals.section_count).toBe(3);
  });

  it('splits combined headings', () => {
    const signals = detector.detect(['Skills & Certifications', 'Education and Training'].join('\n'));
    expect(signals.sections).toEqual({
      summary: false,
      experience: false,
      education: true,
      skills: true,
      projects: false,
      certifications: true,
    });
  });

  it('does not treat section names inside sentences as headings', () => {
    const signals = detector.detect('I have experience in sales and strong skills in negotiation');
    expect(signals.section_count).toBe(0);
  });

  it('rejects very long decorated lines without backtracking', () => {
    const signals = detector.detect(`Summary\n${'.'.repeat(200_000)}x\n${'-'.repeat(200_000)}y`);

    expect(signals.sections.summary).toBe(true);
    expect(signals.section_count).toBe(1);
  }, 2_000);

  it('never lowers the section count when a heading is added', () => {
    const base = ['Experience', 'Education', filler(20)];
    const before = detector.detect(base.join('\n'));
    const after = detector.detect([...base, 'Certifications'].join('\n'));
    expect(before.section_count).toBe(2);
    expect(after.section_count).toBe(3);
  });
});

describe('bullet counting', () => {
  it('counts glyph bullets and short action-verb sentences', () => {
    const signals = detector.detect([
      '• Led a team of five',
      '* Wrote onboarding guides',
      '- Owned the release calendar',
      'Streamlined the invoicing process',
      '-no space after the dash',
      'led by example',
      `Managed ${filler(30)}`,
    ].join('\n'));
    expect(signals.bullet_count).toBe(4);
  });
});

describe('keyword matching', () => {
  it('matches whole terms only', () => {
    const signals = detector.detect('Skilled in JavaScript and Excellent with clients');
    expect(signals.keyword_hits).toEqual(['javascript']);
  });

  it('counts repeated occurrences of one keyword once in hits', () => {
    const signals = detector.detect('Managed budgets. managed teams.');
    expect(signals.keyword_hits).toEqual(['managed']);
    expect(signals.keyword_occurrences).toBe(2);
  });

  it('matches terms with symbols and multi-word phrases', () => {
    const signals = detector.detect('Wrote C++ services and did data\nanalysis daily');
    expect(signals.keyword_hits).toEqual(['c++', 'data analysis']);
  });

  it('adds role keywords for a matching job title', () => {
    const text = 'Built REST services in C++ with react';
    expect(detector.detect(text).keyword_hits).toEqual(['built', 'c++']);
    expect(detector.detect(text, { jobTitle: 'Frontend Developer' }).keyword_hits)
      .toEqual(['built', 'c++', 'react', 'rest']);
  });

  it('ignores a job title that names no configured role', () => {
    const text = 'Built REST services in C++ with react';
    expect(detector.detect(text, { jobTitle: 'Chef' }).keyword_hits).toEqual(['built', 'c++']);
  });
});

describe('length buckets', () => {
  it('uses inclusive bounds for the ideal range', () => {
    expect(detector.detect(filler(149)).length_bucket).toBe('too_short');
    expect(detector.detect(filler(150)).length_bucket).toBe('ideal');
    expect(detector.detect(filler(800)).length_bucket).toBe('ideal');
    expect(detector.detect(filler(801)).length_bucket).toBe('too_long');
  });
});

describe('formatting risk', () => {
  it('flags pipe-delimited table rows', () => {
    const signals = detector.detect('Name | Title | Phone');
    expect(signals.formatting_issues).toEqual(['table_layout']);
    expect(signals.formatting_risk).toBe(true);
  });

  it('flags column layouts that leave wide gaps on many lines', () => {
    const signals = detector.detect([
      'Experience        Skills',
      'Acme Corp         Negotiation',
      'Globex            Forecasting',
      'Summary',
    ].join('\n'));
    expect(signals.formatting_issues).toEqual(['multi_column']);
  });

  it('flags non-standard bullet glyphs and decorative symbols', () => {
    const signals = detector.detect(['▪ Ran payroll', '★ Employee of the month'].join('\n'));
    expect(signals.formatting_issues).toEqual(['nonstandard_bullets', 'decorative_symbols']);
  });

  it('fills every field for empty text', () => {
    const signals = detector.detect('');
    expect(signals.word_count).toBe(0);
    expect(signals.length_bucket).toBe('too_short');
    expect(signals.bullet_count).toBe(0);
    expect(signals.formatting_risk).toBe(false);
    expect(signals.keyword_hits).toEqual([]);
  });
});
