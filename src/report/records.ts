/**
 * Report records
 *
 * Flat row shapes for persistence. One SummaryRow per LevelSummary and,
 * when raw outcomes are kept, one OutcomeRow per recorded request.
 */

import type { LevelRun, LevelSummary, SweepResult } from '../types/index.js';
import { safeDivide } from '../utils/math-helpers.js';

export interface SummaryRow {
  concurrency: number;
  mean_response_time: number;
  stdev_response_time: number;
  mean_requests_per_second: number;
  stdev_requests_per_second: number;
  mean_output_token_throughput: number;
  stdev_output_token_throughput: number;
  mean_combined_token_throughput: number;
  stdev_combined_token_throughput: number;
  mean_success_rate: number;
  stdev_success_rate: number;
  repetitions: number;
  requests: number;
  truncated_runs: number;
  error: string;
}

export interface OutcomeRow {
  timestamp: string;
  concurrency: number;
  repetition: number;
  id: string;
  success: boolean;
  status_code: number | '';
  error_kind: string;
  response_time: number;
  tokens_generated: number;
  tokens_input: number;
  total_tokens: number;
  tokens_per_second: number;
  attempts: number;
  tokens_estimated: boolean | '';
  endpoint_type: string;
}

export const SUMMARY_COLUMNS: ReadonlyArray<keyof SummaryRow> = [
  'concurrency',
  'mean_response_time',
  'stdev_response_time',
  'mean_requests_per_second',
  'stdev_requests_per_second',
  'mean_output_token_throughput',
  'stdev_output_token_throughput',
  'mean_combined_token_throughput',
  'stdev_combined_token_throughput',
  'mean_success_rate',
  'stdev_success_rate',
  'repetitions',
  'requests',
  'truncated_runs',
  'error',
];

export const OUTCOME_COLUMNS: ReadonlyArray<keyof OutcomeRow> = [
  'timestamp',
  'concurrency',
  'repetition',
  'id',
  'success',
  'status_code',
  'error_kind',
  'response_time',
  'tokens_generated',
  'tokens_input',
  'total_tokens',
  'tokens_per_second',
  'attempts',
  'tokens_estimated',
  'endpoint_type',
];

export function toSummaryRow(level: LevelSummary): SummaryRow {
  return {
    concurrency: level.concurrency,
    mean_response_time: level.avgResponseTime.mean,
    stdev_response_time: level.avgResponseTime.stdDev,
    mean_requests_per_second: level.requestsPerSecond.mean,
    stdev_requests_per_second: level.requestsPerSecond.stdDev,
    mean_output_token_throughput: level.outputTokenThroughput.mean,
    stdev_output_token_throughput: level.outputTokenThroughput.stdDev,
    mean_combined_token_throughput: level.combinedTokenThroughput.mean,
    stdev_combined_token_throughput: level.combinedTokenThroughput.stdDev,
    mean_success_rate: level.successRate.mean,
    stdev_success_rate: level.successRate.stdDev,
    repetitions: level.repetitions,
    requests: level.requestsPerRun,
    truncated_runs: level.truncatedRuns,
    error: level.error ?? '',
  };
}

export function toSummaryRows(sweep: SweepResult): SummaryRow[] {
  return sweep.levels.map(toSummaryRow);
}

export function toOutcomeRows(runs: readonly LevelRun[], endpointType: string): OutcomeRow[] {
  const rows: OutcomeRow[] = [];

  for (const run of runs) {
    for (const outcome of run.outcomes) {
      const seconds = outcome.durationMs / 1000;
      rows.push({
        timestamp: new Date(outcome.startedAt).toISOString(),
        concurrency: run.concurrency,
        repetition: run.repetition,
        id: outcome.id,
        success: outcome.success,
        status_code: outcome.success ? outcome.statusCode : (outcome.error.statusCode ?? ''),
        error_kind: outcome.success ? '' : outcome.error.kind,
        response_time: seconds,
        tokens_generated: outcome.outputTokens,
        tokens_input: outcome.inputTokens,
        total_tokens: outcome.outputTokens + outcome.inputTokens,
        tokens_per_second: safeDivide(outcome.outputTokens, seconds),
        attempts: outcome.attempts,
        tokens_estimated: outcome.success ? outcome.tokensEstimated : '',
        endpoint_type: endpointType,
      });
    }
  }

  return rows;
}

/**
 * `load_test_<ts>_c<level>` for a single level, `scaling_test_<ts>` otherwise
 */
export function reportBaseName(levels: readonly number[], date: Date): string {
  const timestamp = formatTimestamp(date);
  const [only] = levels;
  if (levels.length === 1 && only !== undefined) {
    return `load_test_${timestamp}_c${only}`;
  }
  return `scaling_test_${timestamp}`;
}

/**
 * YYYYMMDD_HHMMSS in UTC
 */
export function formatTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `_${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}
