import type { ScanErrorCode } from './errors.js';

const LATENCY_BUCKETS_MS = [50, 100, 250, 500, 1000, 2000, 5000, 10000, 30000];

export type ScanOutcomeKind = 'scored' | 'report_degraded' | ScanErrorCode;

interface HttpCounters {
  total: number;
  status_2xx: number;
  status_4xx: number;
  status_5xx: number;
  status_413: number;
  status_429: number;
}

const http: HttpCounters = {
  total: 0,
  status_2xx: 0,
  status_4xx: 0,
  status_5xx: 0,
  status_413: 0,
  status_429: 0,
};

const outcomes = new Map<ScanOutcomeKind, number>();
let aiInsights = 0;
let scoreSum = 0;
let scoredCount = 0;

let latencyCount = 0;
let latencySumMs = 0;
const latencyHistogram = new Array<number>(LATENCY_BUCKETS_MS.length + 1).fill(0);

function estimatePercentile(p: number): number {
  if (latencyCount <= 0) return 0;
  const target = Math.max(1, Math.ceil(latencyCount * p));
  let running = 0;
  for (let i = 0; i < latencyHistogram.length; i += 1) {
    running += latencyHistogram[i];
    if (running >= target) {
      return i < LATENCY_BUCKETS_MS.length ? LATENCY_BUCKETS_MS[i] : LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1];
    }
  }
  return LATENCY_BUCKETS_MS[LATENCY_BUCKETS_MS.length - 1];
}

export function recordRequestMetric(status: number): void {
  http.total += 1;
  if (status >= 200 && status < 300) http.status_2xx += 1;
  else if (status >= 400 && status < 500) http.status_4xx += 1;
  else if (status >= 500) http.status_5xx += 1;

  if (status === 413) http.status_413 += 1;
  if (status === 429) http.status_429 += 1;
}

export function recordScanOutcome(
  outcome: ScanOutcomeKind,
  latencyMs: number,
  details: { score?: number; aiInsight?: boolean } = {},
): void {
  outcomes.set(outcome, (outcomes.get(outcome) ?? 0) + 1);
  if (details.aiInsight) aiInsights += 1;
  if (details.score !== undefined) {
    scoredCount += 1;
    scoreSum += details.score;
  }

  latencyCount += 1;
  latencySumMs += latencyMs;
  const idx = LATENCY_BUCKETS_MS.findIndex((limit) => latencyMs <= limit);
  latencyHistogram[idx >= 0 ? idx : LATENCY_BUCKETS_MS.length] += 1;
}

export function getScanMetrics() {
  return {
    http: { ...http },
    scans: {
      outcomes: Object.fromEntries(outcomes),
      ai_insights: aiInsights,
      avg_score: scoredCount > 0 ? Math.round((scoreSum / scoredCount) * 100) / 100 : 0,
    },
    latency: {
      count: latencyCount,
      avg_ms: latencyCount > 0 ? Math.round((latencySumMs / latencyCount) * 100) / 100 : 0,
      p50_ms_upper_bound: estimatePercentile(0.5),
      p95_ms_upper_bound: estimatePercentile(0.95),
      p99_ms_upper_bound: estimatePercentile(0.99),
      buckets_ms: LATENCY_BUCKETS_MS,
      histogram: [...latencyHistogram],
    },
  };
}

export function resetScanMetricsForTest(): void {
  http.total = 0;
  http.status_2xx = 0;
  http.status_4xx = 0;
  http.status_5xx = 0;
  http.status_413 = 0;
  http.status_429 = 0;
  outcomes.clear();
  aiInsights = 0;
  scoreSum = 0;
  scoredCount = 0;
  latencyCount = 0;
  latencySumMs = 0;
  latencyHistogram.fill(0);
}
