/**
 * TrialAggregator
 *
 * Repeats the ConcurrencyRunner R times at one concurrency level and
 * summarizes the repetitions. Metrics are derived per repetition first;
 * mean and sample standard deviation are then taken across the R values,
 * so run-to-run variance stays visible instead of being averaged away in
 * one pooled sample.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { describeError } from '../api/errors.js';
import type {
  FailedRequestPolicy,
  LevelRun,
  LevelSummary,
  MetricSummary,
  RunMetrics,
  SummaryMetric,
} from '../types/index.js';
import { safeAverage, sampleStdDev } from '../utils/math-helpers.js';
import { sleep } from '../utils/sleep.js';
import type { ConcurrencyRunner } from './concurrency-runner.js';
import type { PromptPool } from './prompt-pool.js';
import { computeRunMetrics } from './run-metrics.js';

export interface TrialAggregatorEvents {
  repetitionCompleted: (run: LevelRun, metrics: RunMetrics) => void;
}

export interface TrialAggregatorOptions {
  runner: ConcurrencyRunner;
  /** Called once per repetition so no two repetitions share prompts */
  createPool: () => PromptPool;
  repetitions: number;
  warmupRequests: number;
  /** null: one request per worker (requests = concurrency) */
  requestsPerRun: number | null;
  runDurationMs?: number | null;
  runDeadlineMs?: number | null;
  repetitionCooldownMs?: number;
  failedRequestPolicy?: FailedRequestPolicy;
  logger?: Logger;
}

export function summarize(values: readonly number[]): MetricSummary {
  return Object.freeze({ mean: safeAverage(values), stdDev: sampleStdDev(values) });
}

/**
 * Build a LevelSummary from per-repetition metrics.
 *
 * Response time is averaged over repetitions with at least one success;
 * a repetition where everything failed has no response time to report.
 */
export function summarizeLevel(
  concurrency: number,
  requestsPerRun: number,
  runs: readonly RunMetrics[],
  error?: string
): LevelSummary {
  const pick = (metric: SummaryMetric, source: readonly RunMetrics[] = runs): number[] =>
    source.map((run) => run[metric]);
  const answered = runs.filter((run) => run.successes > 0);

  return Object.freeze({
    concurrency,
    repetitions: runs.length,
    requestsPerRun,
    avgResponseTime: summarize(pick('avgResponseTime', answered)),
    requestsPerSecond: summarize(pick('requestsPerSecond')),
    outputTokenThroughput: summarize(pick('outputTokenThroughput')),
    combinedTokenThroughput: summarize(pick('combinedTokenThroughput')),
    successRate: summarize(pick('successRate')),
    runs: Object.freeze([...runs]),
    truncatedRuns: runs.filter((run) => run.truncated).length,
    ...(error !== undefined ? { error } : {}),
  });
}

export class TrialAggregator extends EventEmitter<TrialAggregatorEvents> {
  private readonly options: TrialAggregatorOptions;
  private readonly logger?: Logger;

  constructor(options: TrialAggregatorOptions) {
    super();
    if (!Number.isInteger(options.repetitions) || options.repetitions < 1) {
      throw new Error(`repetitions must be a positive integer, got ${options.repetitions}`);
    }
    this.options = options;
    this.logger = options.logger;
  }

  /**
   * Measured requests per repetition. Unset with a duration bound means
   * the duration alone ends the run.
   */
  public requestCount(concurrency: number): number | undefined {
    if (this.options.requestsPerRun !== null) {
      return this.options.requestsPerRun;
    }
    return this.options.runDurationMs != null ? undefined : concurrency;
  }

  public async aggregate(concurrency: number): Promise<LevelSummary> {
    const requestCount = this.requestCount(concurrency);
    const metrics: RunMetrics[] = [];

    const requestsPerRun = (): number =>
      requestCount ?? Math.round(safeAverage(metrics.map((run) => run.total)));

    for (let repetition = 1; repetition <= this.options.repetitions; repetition++) {
      try {
        await this.repeat(concurrency, repetition, requestCount, metrics);
      } catch (error) {
        // Repetitions that already finished still count toward the summary
        const message = describeError(error);
        this.logger?.error(
          { concurrency, repetition, completed: metrics.length, error: message },
          'Repetition failed'
        );
        return summarizeLevel(concurrency, requestsPerRun(), metrics, message);
      }
    }

    return summarizeLevel(concurrency, requestsPerRun(), metrics);
  }

  private async repeat(
    concurrency: number,
    repetition: number,
    requestCount: number | undefined,
    metrics: RunMetrics[]
  ): Promise<void> {
    const cooldownMs = this.options.repetitionCooldownMs ?? 0;
    if (repetition > 1 && cooldownMs > 0) {
      await sleep(cooldownMs);
    }

    const run = await this.options.runner.run({
      concurrency,
      requestCount,
      warmupCount: this.options.warmupRequests,
      pool: this.options.createPool(),
      repetition,
      durationMs: this.options.runDurationMs ?? null,
      deadlineMs: this.options.runDeadlineMs ?? null,
    });

    const runMetrics = computeRunMetrics(run, this.options.failedRequestPolicy ?? 'exclude');
    metrics.push(runMetrics);

    this.logger?.info(
      {
        concurrency,
        repetition,
        successRate: runMetrics.successRate,
        avgResponseTime: runMetrics.avgResponseTime,
        requestsPerSecond: runMetrics.requestsPerSecond,
      },
      'Repetition completed'
    );
    this.emit('repetitionCompleted', run, runMetrics);
  }
}
