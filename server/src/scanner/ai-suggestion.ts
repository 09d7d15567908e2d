import { z } from 'zod';
import type { AiSettings } from '../lib/config.js';
import { AiServiceUnavailableError, errorMessage } from '../lib/errors.js';
import baseLogger, { type Logger } from '../lib/logger.js';
import type { FeedbackItem } from './types.js';

export const AI_SYSTEM_PROMPT = 'You are a professional resume coach. Provide concise, actionable suggestions.';

export interface SuggestOptions {
  /** Caller cancellation; combined with the adapter's own timeout. */
  signal?: AbortSignal;
  logger?: Logger;
}

/** Optional capability: returns null whenever no suggestion is available. */
export interface SuggestionAdapter {
  readonly configured: boolean;
  suggest(text: string, options?: SuggestOptions): Promise<FeedbackItem | null>;
}

type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface OpenRouterAdapterConfig extends AiSettings {
  fetch?: FetchLike;
}

// ─── OpenAI-compatible response shape ───────────────────────────────

const completionSchema = z.object({
  choices: z.array(z.object({
    message: z.object({
      content: z.string().nullish(),
    }),
  })).min(1),
});

// ─── Abort handling ─────────────────────────────────────────────────

function createCombinedAbortSignal(
  callerSignal: AbortSignal | undefined,
  timeoutMs: number,
): { signal: AbortSignal; cleanup: () => void } {
  const controller = new AbortController();
  const timeout = setTimeout(() => {
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);
  timeout.unref?.();

  const onCallerAbort = () => {
    if (!controller.signal.aborted) controller.abort(callerSignal?.reason);
  };
  if (callerSignal) {
    if (callerSignal.aborted) {
      onCallerAbort();
    } else {
      callerSignal.addEventListener('abort', onCallerAbort, { once: true });
    }
  }

  const cleanup = () => {
    clearTimeout(timeout);
    callerSignal?.removeEventListener('abort', onCallerAbort);
  };
  return { signal: controller.signal, cleanup };
}

// ─── Prompt helpers ─────────────────────────────────────────────────

export function truncateForPrompt(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text;
  const cut = text.slice(0, maxChars);
  const lastSpace = cut.lastIndexOf(' ');
  return `${lastSpace > maxChars * 0.8 ? cut.slice(0, lastSpace) : cut} …`;
}

export function buildSuggestionPrompt(text: string, maxChars: number): string {
  return [
    'Review the following resume for Applicant Tracking System (ATS) compatibility.',
    'Provide 3-5 concise bullet points for improvement.',
    '',
    'RESUME TEXT:',
    truncateForPrompt(text, maxChars),
  ].join('\n');
}

/** Drops reasoning blocks that some models return ahead of the answer. */
export function cleanCompletionText(raw: string): string {
  return raw.replace(/<think>[\s\S]*?<\/think>/gi, '').trim();
}

// ─── Adapter ─────────────────────────────────────────────────────────

/**
 * Talks to an OpenAI-compatible chat completions endpoint (OpenRouter by
 * default). Fail-open: no credential, a timeout, a non-2xx reply or an
 * unreadable body all resolve to null. Never retried.
 */
export class OpenRouterSuggestionAdapter implements SuggestionAdapter {
  private readonly settings: AiSettings;
  private readonly fetchImpl: FetchLike;

  constructor(config: OpenRouterAdapterConfig) {
    const { fetch: fetchImpl, ...settings } = config;
    this.settings = { ...settings, baseUrl: settings.baseUrl.replace(/\/$/, '') };
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  get configured(): boolean {
    return this.settings.enabled && Boolean(this.settings.apiKey);
  }

  async suggest(text: string, options: SuggestOptions = {}): Promise<FeedbackItem | null> {
    if (!this.configured || !text.trim()) return null;
    const log = options.logger ?? baseLogger;
    const startedAt = Date.now();

    try {
      const content = await this.requestCompletion(text, options.signal);
      log.info({ model: this.settings.model, duration_ms: Date.now() - startedAt }, 'AI suggestion received');
      return Object.freeze({ severity: 'insight', message: content });
    } catch (err) {
      log.warn(
        { model: this.settings.model, duration_ms: Date.now() - startedAt, error: errorMessage(err) },
        'AI suggestion unavailable; continuing without it',
      );
      return null;
    }
  }

  private async requestCompletion(text: string, callerSignal?: AbortSignal): Promise<string> {
    const { signal, cleanup } = createCombinedAbortSignal(callerSignal, this.settings.timeoutMs);
    try {
      let response: Response;
      try {
        response = await this.fetchImpl(`${this.settings.baseUrl}/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            'Authorization': `Bearer ${this.settings.apiKey ?? ''}`,
          },
          body: JSON.stringify({
            model: this.settings.model,
            temperature: this.settings.temperature,
            messages: [
              { role: 'system', content: AI_SYSTEM_PROMPT },
              { role: 'user', content: buildSuggestionPrompt(text, this.settings.maxInputChars) },
            ],
          }),
          signal,
        });
      } catch (err) {
        const reason = signal.aborted ? errorMessage(signal.reason) : errorMessage(err);
        throw new AiServiceUnavailableError(`AI request failed: ${reason}`, err);
      }

      if (!response.ok) {
        const errText = await response.text().catch(() => '');
        throw new AiServiceUnavailableError(`AI API error ${response.status}: ${errText.slice(0, 200)}`);
      }

      const parsed = completionSchema.safeParse(await response.json().catch(() => null));
      if (!parsed.success) {
        throw new AiServiceUnavailableError('AI API returned an unexpected payload');
      }

      const content = cleanCompletionText(parsed.data.choices[0].message.content ?? '');
      if (!content) {
        throw new AiServiceUnavailableError('AI API returned an empty completion');
      }
      return content;
    } finally {
      cleanup();
    }
  }
}
