import type { ScoringConfig, ServerSettings } from '../lib/config.js';
import { ScanError, errorMessage } from '../lib/errors.js';
import baseLogger, { type Logger } from '../lib/logger.js';
import { OpenRouterSuggestionAdapter, type SuggestionAdapter } from './ai-suggestion.js';
import { renderReport } from './report-renderer.js';
import { FileReportStore, type ReportStore } from './report-store.js';
import { ScoringEngine, type RuleScore } from './scoring-engine.js';
import { SignalDetector } from './signal-detector.js';
import { createResumeDocument, extractText } from './text-extractor.js';
import type { FeedbackItem, RenderedReport, ScoreResult, SignalSet, StoredReport } from './types.js';

export interface ScanOptions {
  /** Aborting cancels an in-flight AI call; its result is then discarded. */
  signal?: AbortSignal;
  jobTitle?: string;
  logger?: Logger;
}

export interface ScoringRun {
  result: ScoreResult;
  signals: SignalSet;
  breakdown: readonly RuleScore[];
}

export interface ScanOutcome extends ScoringRun {
  report: StoredReport | null;
  /** Set when the score was computed but no downloadable report could be produced. */
  reportError?: 'RENDER_FAILURE';
}

export interface ResumeScannerDeps {
  detector: SignalDetector;
  engine: ScoringEngine;
  suggester: SuggestionAdapter | null;
  renderer: (result: ScoreResult) => RenderedReport;
  store: ReportStore;
}

function appendInsight(result: ScoreResult, insight: FeedbackItem | null): ScoreResult {
  if (!insight) return result;
  return Object.freeze({
    score: result.score,
    feedback: Object.freeze([...result.feedback, insight]),
  });
}

/**
 * One stateless pipeline per call: bytes, text, signals, score, then an
 * optional report. Only the frozen configuration inside the detector and the
 * engine is shared between concurrent scans.
 */
export class ResumeScanner {
  constructor(private readonly deps: ResumeScannerDeps) {}

  get aiConfigured(): boolean {
    return this.deps.suggester?.configured ?? false;
  }

  async runScoring(
    documentBytes: Uint8Array,
    formatHint: string,
    aiEnabled: boolean,
    options: ScanOptions = {},
  ): Promise<ScoringRun> {
    const log = options.logger ?? baseLogger;
    const startedAt = Date.now();

    const doc = createResumeDocument(documentBytes, formatHint);
    const extracted = await extractText(doc);
    const extractedAt = Date.now();

    // The AI call only needs the text, so it runs while the rules are evaluated.
    const suggester = aiEnabled && this.deps.suggester?.configured ? this.deps.suggester : null;
    const pendingInsight = suggester
      ? suggester.suggest(extracted.text, { signal: options.signal, logger: log })
      : Promise.resolve(null);

    const signals = this.deps.detector.detect(extracted.lines.join('\n'), { jobTitle: options.jobTitle });
    const { result, breakdown } = this.deps.engine.evaluate(signals);
    const insight = await pendingInsight;

    log.info({
      format: doc.format,
      bytes: documentBytes.length,
      words: signals.word_count,
      score: result.score,
      ai_requested: aiEnabled,
      ai_insight: insight !== null,
      extract_ms: extractedAt - startedAt,
      total_ms: Date.now() - startedAt,
    }, 'Resume scored');

    return {
      result: appendInsight(result, options.signal?.aborted ? null : insight),
      signals,
      breakdown,
    };
  }

  /** Scores the document, then renders and persists the report. A report failure degrades, never fails, the scan. */
  async scan(
    documentBytes: Uint8Array,
    formatHint: string,
    aiEnabled: boolean,
    options: ScanOptions = {},
  ): Promise<ScanOutcome> {
    const log = options.logger ?? baseLogger;
    const run = await this.runScoring(documentBytes, formatHint, aiEnabled, options);

    try {
      const rendered = this.deps.renderer(run.result);
      const report = await this.deps.store.persist(rendered);
      log.info({ report_id: report.id, pages: rendered.pageCount }, 'Report generated');
      return { ...run, report };
    } catch (err) {
      log.warn(
        { error: errorMessage(err), code: err instanceof ScanError ? err.code : undefined },
        'Report generation failed; returning score without a report',
      );
      return { ...run, report: null, reportError: 'RENDER_FAILURE' };
    }
  }
}

export function createResumeScanner(
  settings: ServerSettings,
  config: ScoringConfig,
  store: ReportStore = new FileReportStore(settings.reportDir),
): ResumeScanner {
  return new ResumeScanner({
    detector: new SignalDetector(config),
    engine: new ScoringEngine(config),
    suggester: new OpenRouterSuggestionAdapter(settings.ai),
    renderer: renderReport,
    store,
  });
}
