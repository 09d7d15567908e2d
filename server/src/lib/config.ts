import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { CANONICAL_SECTIONS, type CanonicalSection } from '../scanner/types.js';

export function parsePositiveInt(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseInt(raw ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

export function envBool(raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = raw.trim().toLowerCase();
  return value === '1' || value === 'true';
}

function parseTemperature(raw: string | undefined, fallback: number): number {
  const parsed = Number.parseFloat(raw ?? '');
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 2 ? parsed : fallback;
}

// ─── Scoring configuration (scoring.json) ───────────────────────────

const positiveInt = z.number().int().positive();
const weight = z.number().int().min(0).max(100);

const aliasList = z.array(z.string().min(1)).min(1);

const sectionAliasesSchema = z.object({
  summary: aliasList,
  experience: aliasList,
  education: aliasList,
  skills: aliasList,
  projects: aliasList,
  certifications: aliasList,
}) satisfies z.ZodType<Record<CanonicalSection, string[]>>;

export const scoringConfigSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
  role_keywords: z.record(z.string().min(1), z.array(z.string().min(1))).default({}),
  action_verbs: z.array(z.string().min(1)).default([]),
  section_aliases: sectionAliasesSchema,
  rules: z.object({
    contact: z.object({ weight }),
    sections: z.object({ weight, target: positiveInt.max(CANONICAL_SECTIONS.length) }),
    bullets: z.object({ weight, target: positiveInt, partial_weight: weight }),
    keywords: z.object({ weight, target: positiveInt }),
    length: z.object({ weight, fallback_weight: weight, min_words: positiveInt, max_words: positiveInt }),
    formatting: z.object({ weight }),
  }),
}).superRefine((config, ctx) => {
  const { rules } = config;
  const total = rules.contact.weight + rules.sections.weight + rules.bullets.weight
    + rules.keywords.weight + rules.length.weight + rules.formatting.weight;
  if (total !== 100) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules'], message: `Rule weights must sum to 100 (got ${total})` });
  }
  if (rules.bullets.partial_weight > rules.bullets.weight) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules', 'bullets', 'partial_weight'], message: 'partial_weight cannot exceed weight' });
  }
  if (rules.length.fallback_weight > rules.length.weight) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules', 'length', 'fallback_weight'], message: 'fallback_weight cannot exceed weight' });
  }
  if (rules.length.min_words >= rules.length.max_words) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['rules', 'length'], message: 'min_words must be below max_words' });
  }
});

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type ScoringConfig = DeepReadonly<z.infer<typeof scoringConfigSchema>>;
export type RuleWeights = ScoringConfig['rules'];

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object') {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Validates raw JSON and returns a frozen configuration value. Throws on invalid input. */
export function parseScoringConfig(raw: unknown): ScoringConfig {
  const result = scoringConfigSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid scoring configuration: ${detail}`);
  }
  return deepFreeze(result.data);
}

export function defaultScoringConfigPath(): string {
  const currentDir = dirname(fileURLToPath(import.meta.url));
  return join(currentDir, '..', '..', 'config', 'scoring.json');
}

export function loadScoringConfig(path = process.env.SCORING_CONFIG_PATH): ScoringConfig {
  const configPath = path ? resolve(path) : defaultScoringConfigPath();
  const raw: unknown = JSON.parse(readFileSync(configPath, 'utf8'));
  return parseScoringConfig(raw);
}

// ─── Runtime settings (environment) ─────────────────────────────────

export interface AiSettings {
  enabled: boolean;
  apiKey: string | undefined;
  baseUrl: string;
  model: string;
  timeoutMs: number;
  maxInputChars: number;
  temperature: number;
}

export interface ServerSettings {
  port: number;
  reportDir: string;
  maxUploadBytes: number;
  scanRateLimitMax: number;
  scanRateLimitWindowMs: number;
  ai: AiSettings;
}

export function readServerSettings(env: NodeJS.ProcessEnv = process.env): ServerSettings {
  const apiKey = env.OPENROUTER_API_KEY?.trim();
  return {
    port: parsePositiveInt(env.PORT, 3001),
    reportDir: resolve(env.REPORT_DIR ?? 'reports'),
    maxUploadBytes: parsePositiveInt(env.MAX_UPLOAD_BYTES, 5 * 1024 * 1024),
    scanRateLimitMax: parsePositiveInt(env.SCAN_RATE_LIMIT_MAX, 20),
    scanRateLimitWindowMs: parsePositiveInt(env.SCAN_RATE_LIMIT_WINDOW_MS, 60_000),
    ai: {
      enabled: envBool(env.FF_AI_SUGGESTIONS, true),
      apiKey: apiKey ? apiKey : undefined,
      baseUrl: env.AI_BASE_URL ?? 'https://openrouter.ai/api/v1',
      model: env.AI_MODEL ?? 'deepseek/deepseek-r1-0528:free',
      timeoutMs: parsePositiveInt(env.AI_TIMEOUT_MS, 30_000),
      maxInputChars: parsePositiveInt(env.AI_MAX_INPUT_CHARS, 8_000),
      temperature: parseTemperature(env.AI_TEMPERATURE, 0.7),
    },
  };
}
