/**
 * ScalingSweeper
 *
 * Runs the TrialAggregator for each configured concurrency level, in
 * the order given, and collects a SweepResult.
 *
 * Only setup problems are fatal: an empty or non-positive level list, or
 * an endpoint that does not answer the preflight ping. Once the sweep
 * is under way a level that fails is recorded with a zeroed summary and
 * the next level still runs.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import { describeError, LoadTestError } from '../api/errors.js';
import type { RequestTransport } from '../transport/types.js';
import type { LevelRun, LevelSummary, RunMetrics, SweepResult } from '../types/index.js';
import { resultify } from '../utils/result-helpers.js';
import { sleep } from '../utils/sleep.js';
import { summarizeLevel, type TrialAggregator } from './trial-aggregator.js';

export interface ScalingSweeperEvents {
  levelStarted: (concurrency: number, index: number, total: number) => void;
  repetitionCompleted: (run: LevelRun, metrics: RunMetrics) => void;
  levelCompleted: (summary: LevelSummary) => void;
}

export interface ScalingSweeperOptions {
  aggregator: TrialAggregator;
  concurrencyLevels: readonly number[];
  /** Pinged once before the first level when it implements ping() */
  transport?: RequestTransport;
  preflightTimeoutMs?: number;
  /** Pause between levels (not after the last) */
  cooldownMs?: number;
  /** Keep every LevelRun on the result */
  retainRuns?: boolean;
  logger?: Logger;
  now?: () => Date;
}

const DEFAULT_PREFLIGHT_TIMEOUT_MS = 10_000;

export function validateConcurrencyLevels(levels: readonly number[]): void {
  if (levels.length === 0) {
    throw new LoadTestError('ValidationError', 'At least one concurrency level is required');
  }
  const invalid = levels.filter((level) => !Number.isInteger(level) || level < 1);
  if (invalid.length > 0) {
    throw new LoadTestError(
      'ValidationError',
      `Concurrency levels must be positive integers, got ${invalid.join(', ')}`,
      { invalid }
    );
  }
}

export class ScalingSweeper extends EventEmitter<ScalingSweeperEvents> {
  private readonly options: ScalingSweeperOptions;
  private readonly logger?: Logger;
  private readonly now: () => Date;

  constructor(options: ScalingSweeperOptions) {
    super();
    this.options = options;
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
  }

  public async run(): Promise<SweepResult> {
    const { aggregator, concurrencyLevels } = this.options;
    validateConcurrencyLevels(concurrencyLevels);

    await this.preflight();

    const startedAt = this.now().toISOString();
    const levels: LevelSummary[] = [];
    const runs: LevelRun[] = [];
    const cooldownMs = this.options.cooldownMs ?? 0;

    const onRepetition = (run: LevelRun, metrics: RunMetrics): void => {
      if (this.options.retainRuns) {
        runs.push(run);
      }
      this.emit('repetitionCompleted', run, metrics);
    };
    aggregator.on('repetitionCompleted', onRepetition);

    try {
      for (const [index, concurrency] of concurrencyLevels.entries()) {
        if (index > 0 && cooldownMs > 0) {
          this.logger?.info({ cooldownMs }, 'Cooling down before next level');
          await sleep(cooldownMs);
        }

        this.logger?.info(
          { concurrency, level: index + 1, levels: concurrencyLevels.length },
          'Testing concurrency level'
        );
        this.emit('levelStarted', concurrency, index, concurrencyLevels.length);

        const summary = await this.runLevel(concurrency);
        levels.push(summary);
        this.emit('levelCompleted', summary);
      }
    } finally {
      aggregator.off('repetitionCompleted', onRepetition);
    }

    return Object.freeze({
      startedAt,
      completedAt: this.now().toISOString(),
      levels: Object.freeze(levels),
      runs: Object.freeze(runs),
    });
  }

  private async runLevel(concurrency: number): Promise<LevelSummary> {
    const { aggregator } = this.options;
    try {
      return await aggregator.aggregate(concurrency);
    } catch (error) {
      const message = describeError(error);
      this.logger?.error({ concurrency, error: message }, 'Concurrency level failed');
      return summarizeLevel(concurrency, aggregator.requestCount(concurrency) ?? 0, [], message);
    }
  }

  /**
   * Any HTTP answer passes; only an unreachable endpoint aborts the sweep
   */
  private async preflight(): Promise<void> {
    const transport = this.options.transport;
    if (!transport?.ping) {
      return;
    }

    const timeoutMs = this.options.preflightTimeoutMs ?? DEFAULT_PREFLIGHT_TIMEOUT_MS;
    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new Error(`Preflight timed out after ${timeoutMs}ms`)),
      timeoutMs
    );

    const pinged = await resultify(transport.ping(controller.signal));
    clearTimeout(timer);

    if (pinged.err) {
      const reason = controller.signal.aborted
        ? `no answer within ${timeoutMs}ms`
        : describeError(pinged.val);
      throw new LoadTestError('PreflightError', `Endpoint is not reachable: ${reason}`, {
        timeoutMs,
      });
    }

    this.logger?.info('Preflight check passed');
  }
}
