/**
 * Run Metrics
 *
 * Derives the per-repetition metrics of one sealed LevelRun. All times
 * are reported in seconds.
 *
 * Throughput window:
 * - exclude: first start to last end over successful requests only
 * - include: first start to last end over every recorded outcome
 * A window of zero (no qualifying requests) yields zero throughput.
 */

import type {
  FailedRequestPolicy,
  LevelRun,
  RequestErrorKind,
  RequestOutcome,
  RunMetrics,
} from '../types/index.js';
import { percentile, safeAverage, safeDivide, safeSum } from '../utils/math-helpers.js';

function windowSeconds(outcomes: readonly RequestOutcome[]): number {
  if (outcomes.length === 0) {
    return 0;
  }

  let first = Number.POSITIVE_INFINITY;
  let last = Number.NEGATIVE_INFINITY;
  for (const outcome of outcomes) {
    first = Math.min(first, outcome.startedAt);
    last = Math.max(last, outcome.endedAt);
  }

  return Math.max(0, last - first) / 1000;
}

export function computeRunMetrics(run: LevelRun, policy: FailedRequestPolicy = 'exclude'): RunMetrics {
  const successful = run.outcomes.filter((outcome) => outcome.success);
  const total = run.outcomes.length;

  const errorCounts: Partial<Record<RequestErrorKind, number>> = {};
  for (const outcome of run.outcomes) {
    if (!outcome.success) {
      errorCounts[outcome.error.kind] = (errorCounts[outcome.error.kind] ?? 0) + 1;
    }
  }

  const durations = successful.map((outcome) => outcome.durationMs / 1000).sort((a, b) => a - b);
  const outputTokens = safeSum(successful.map((outcome) => outcome.outputTokens));
  const inputTokens = safeSum(successful.map((outcome) => outcome.inputTokens));
  const window = windowSeconds(policy === 'include' ? run.outcomes : successful);

  return Object.freeze({
    repetition: run.repetition,
    total,
    successes: successful.length,
    failures: total - successful.length,
    successRate: safeDivide(successful.length, total),
    avgResponseTime: safeAverage(durations),
    requestsPerSecond: safeDivide(successful.length, window),
    outputTokenThroughput: safeDivide(outputTokens, window),
    combinedTokenThroughput: safeDivide(outputTokens + inputTokens, window),
    windowSeconds: window,
    outputTokens,
    inputTokens,
    latency: Object.freeze({
      p50: percentile(durations, 50),
      p95: percentile(durations, 95),
      p99: percentile(durations, 99),
    }),
    errorCounts: Object.freeze(errorCounts),
    truncated: run.truncated,
  });
}
