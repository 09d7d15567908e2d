import { readFileSync } from 'node:fs';
import { describe, it, expect } from 'vitest';
import {
  defaultScoringConfigPath,
  envBool,
  loadScoringConfig,
  parsePositiveInt,
  parseScoringConfig,
  readServerSettings,
  scoringConfigSchema,
} from '../lib/config.js';

function rawConfig() {
  return scoringConfigSchema.parse(JSON.parse(readFileSync(defaultScoringConfigPath(), 'utf8')));
}

describe('loadScoringConfig', () => {
  it('loads the bundled configuration as a deeply frozen value', () => {
    const config = loadScoringConfig();
    expect(config.keywords).toHaveLength(40);
    expect(config.rules.keywords).toEqual({ weight: 25, target: 8 });
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.keywords)).toBe(true);
    expect(Object.isFrozen(config.rules.length)).toBe(true);
    expect(Object.isFrozen(config.section_aliases.summary)).toBe(true);
  });
});

describe('parseScoringConfig', () => {
  it('rejects weights that do not sum to 100', () => {
    const raw = rawConfig();
    raw.rules.contact.weight = 5;
    expect(() => parseScoringConfig(raw)).toThrow(
      'Invalid scoring configuration: rules: Rule weights must sum to 100 (got 95)',
    );
  });

  it('rejects partial credit larger than the full weight', () => {
    const raw = rawConfig();
    raw.rules.bullets.partial_weight = 20;
    expect(() => parseScoringConfig(raw)).toThrow(
      'Invalid scoring configuration: rules.bullets.partial_weight: partial_weight cannot exceed weight',
    );
  });

  it('rejects an inverted length range', () => {
    const raw = rawConfig();
    raw.rules.length.min_words = 900;
    expect(() => parseScoringConfig(raw)).toThrow('rules.length: min_words must be below max_words');
  });

  it('requires aliases for every canonical section', () => {
    const { section_aliases: aliases, ...rest } = rawConfig();
    const { certifications: _dropped, ...partial } = aliases;
    expect(() => parseScoringConfig({ ...rest, section_aliases: partial })).toThrow(
      /section_aliases\.certifications/,
    );
  });

  it('defaults optional lists', () => {
    const { role_keywords: _roles, action_verbs: _verbs, ...rest } = rawConfig();
    const config = parseScoringConfig(rest);
    expect(config.role_keywords).toEqual({});
    expect(config.action_verbs).toEqual([]);
  });
});

describe('environment helpers', () => {
  it('parsePositiveInt falls back on missing or invalid values', () => {
    expect(parsePositiveInt('42', 7)).toBe(42);
    expect(parsePositiveInt(undefined, 7)).toBe(7);
    expect(parsePositiveInt('abc', 7)).toBe(7);
    expect(parsePositiveInt('-5', 7)).toBe(7);
  });

  it('envBool accepts 1/true and falls back when unset', () => {
    expect(envBool('true', false)).toBe(true);
    expect(envBool(' 1 ', false)).toBe(true);
    expect(envBool('false', true)).toBe(false);
    expect(envBool('', true)).toBe(true);
    expect(envBool(undefined, false)).toBe(false);
  });
});

describe('readServerSettings', () => {
  it('applies defaults for an empty environment', () => {
    const settings = readServerSettings({});
    expect(settings.port).toBe(3001);
    expect(settings.maxUploadBytes).toBe(5 * 1024 * 1024);
    expect(settings.scanRateLimitMax).toBe(20);
    expect(settings.scanRateLimitWindowMs).toBe(60_000);
    expect(settings.ai).toEqual({
      enabled: true,
      apiKey: undefined,
      baseUrl: 'https://openrouter.ai/api/v1',
      model: 'deepseek/deepseek-r1-0528:free',
      timeoutMs: 30_000,
      maxInputChars: 8_000,
      temperature: 0.7,
    });
  });

  it('reads AI settings and ignores out-of-range values', () => {
    const settings = readServerSettings({
      OPENROUTER_API_KEY: ' test-secret ',
      FF_AI_SUGGESTIONS: 'false',
      AI_TEMPERATURE: '5',
      AI_TIMEOUT_MS: '1500',
      PORT: 'abc',
    });
    expect(settings.ai.apiKey).toBe('test-secret');
    expect(settings.ai.enabled).toBe(false);
    expect(settings.ai.temperature).toBe(0.7);
    expect(settings.ai.timeoutMs).toBe(1500);
    expect(settings.port).toBe(3001);
  });

  it('treats a blank API key as not configured', () => {
    expect(readServerSettings({ OPENROUTER_API_KEY: '   ' }).ai.apiKey).toBeUndefined();
  });
});
