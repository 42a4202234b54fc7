/**
 * ConcurrencyRunner
 *
 * Drives one LevelRun: an optional warm-up phase whose outcomes are
 * discarded, then the measured phase with exactly min(C, remaining)
 * workers in flight. Each worker pulls its next prompt the moment its
 * previous request settles, so C is a steady-state level rather than an
 * initial burst.
 *
 * Workers never touch the outcome list. They push into an OutcomeChannel
 * and the run's single consumer appends; the only state workers share is
 * the dispatch counter and the prompt cursor, both advanced synchronously.
 */

import { EventEmitter } from 'eventemitter3';
import type { Logger } from 'pino';
import type { LevelRun, PromptRecord, RequestOutcome } from '../types/index.js';
import { OutcomeChannel } from './outcome-channel.js';
import type { PromptPool } from './prompt-pool.js';
import { highResolutionClock, type Clock, type RequestExecutor } from './request-executor.js';
import type { RetryPolicy } from './retry-policy.js';

export interface ConcurrencyRunnerEvents {
  requestCompleted: (outcome: RequestOutcome, concurrency: number, repetition: number) => void;
  warmupCompleted: (payload: { concurrency: number; repetition: number; count: number }) => void;
  runSealed: (run: LevelRun) => void;
}

export interface ConcurrencyRunnerOptions {
  executor: RequestExecutor;
  retryPolicy?: RetryPolicy;
  clock?: Clock;
  logger?: Logger;
}

export interface RunOptions {
  concurrency: number;
  /** Measured requests; may be omitted when durationMs bounds the run */
  requestCount?: number;
  warmupCount?: number;
  pool: PromptPool;
  /** 1-based, recorded on the LevelRun (default: 1) */
  repetition?: number;
  /** Stop dispatching after this long; in-flight requests still finish */
  durationMs?: number | null;
  /** Abort outstanding requests after this long and seal as truncated */
  deadlineMs?: number | null;
}

interface PhaseOptions {
  concurrency: number;
  budget: number | undefined;
  pool: PromptPool;
  signal: AbortSignal;
  isDispatchOpen: () => boolean;
  retry: boolean;
  onOutcome: (outcome: RequestOutcome) => void;
}

export class ConcurrencyRunner extends EventEmitter<ConcurrencyRunnerEvents> {
  private readonly executor: RequestExecutor;
  private readonly retryPolicy?: RetryPolicy;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(options: ConcurrencyRunnerOptions) {
    super();
    this.executor = options.executor;
    this.retryPolicy = options.retryPolicy;
    this.clock = options.clock ?? highResolutionClock;
    this.logger = options.logger;
  }

  public async run(options: RunOptions): Promise<LevelRun> {
    const { concurrency, pool } = options;
    const repetition = options.repetition ?? 1;
    const warmupCount = options.warmupCount ?? 0;
    const durationMs = options.durationMs ?? null;
    const deadlineMs = options.deadlineMs ?? null;

    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    if (options.requestCount === undefined && durationMs === null) {
      throw new Error('Either requestCount or durationMs must bound the run');
    }
    if (options.requestCount !== undefined && (!Number.isInteger(options.requestCount) || options.requestCount < 0)) {
      throw new Error(`requestCount must be a non-negative integer, got ${options.requestCount}`);
    }
    if (!Number.isInteger(warmupCount) || warmupCount < 0) {
      throw new Error(`warmupCount must be a non-negative integer, got ${warmupCount}`);
    }

    if (warmupCount > 0) {
      this.logger?.debug({ concurrency, repetition, warmupCount }, 'Warm-up started');
      await this.drive({
        concurrency,
        budget: warmupCount,
        pool,
        signal: new AbortController().signal,
        isDispatchOpen: () => true,
        retry: false,
        onOutcome: () => undefined,
      });
      this.emit('warmupCompleted', { concurrency, repetition, count: warmupCount });
    }

    const deadline = new AbortController();
    let dispatchOpen = true;
    const timers: NodeJS.Timeout[] = [];
    if (durationMs !== null) {
      timers.push(setTimeout(() => { dispatchOpen = false; }, durationMs));
    }
    if (deadlineMs !== null) {
      timers.push(setTimeout(() => deadline.abort(new Error(`Run deadline of ${deadlineMs}ms exceeded`)), deadlineMs));
    }

    const outcomes: RequestOutcome[] = [];
    let cancelled = 0;
    const startedAt = this.clock();

    let dispatched: number;
    try {
      dispatched = await this.drive({
        concurrency,
        budget: options.requestCount,
        pool,
        signal: deadline.signal,
        isDispatchOpen: () => dispatchOpen,
        retry: this.retryPolicy?.enabled ?? false,
        onOutcome: (outcome) => {
          if (!outcome.success && outcome.error.kind === 'cancelled') {
            cancelled++;
            return;
          }
          outcomes.push(outcome);
          this.emit('requestCompleted', outcome, concurrency, repetition);
        },
      });
    } finally {
      for (const timer of timers) {
        clearTimeout(timer);
      }
    }

    const run: LevelRun = Object.freeze({
      concurrency,
      repetition,
      dispatched,
      outcomes: Object.freeze(outcomes),
      startedAt,
      endedAt: this.clock(),
      truncated: deadline.signal.aborted,
      cancelled,
    });

    this.logger?.info(
      {
        concurrency,
        repetition,
        dispatched,
        completed: outcomes.length,
        successes: outcomes.filter((outcome) => outcome.success).length,
        truncated: run.truncated,
        cancelled,
      },
      'Run sealed'
    );

    this.emit('runSealed', run);
    return run;
  }

  /**
   * Run one phase to completion and return how many prompts were dispatched
   */
  private async drive(phase: PhaseOptions): Promise<number> {
    const channel = new OutcomeChannel<RequestOutcome>();
    let dispatched = 0;

    // A failing worker cancels its siblings without aborting the caller's signal
    const local = new AbortController();
    const forward = (): void => local.abort(phase.signal.reason);
    if (phase.signal.aborted) {
      forward();
    } else {
      phase.signal.addEventListener('abort', forward, { once: true });
    }

    const hasBudget = (): boolean =>
      phase.isDispatchOpen() &&
      !local.signal.aborted &&
      (phase.budget === undefined || dispatched < phase.budget);

    const worker = async (): Promise<void> => {
      try {
        while (hasBudget()) {
          dispatched++;
          const prompt = phase.pool.take();
          const outcome = phase.retry
            ? await this.executeWithRetry(prompt, local.signal)
            : await this.executor.execute(prompt, { signal: local.signal });
          channel.push(outcome);
        }
      } catch (error) {
        local.abort(error);
        throw error;
      }
    };

    const workerCount = phase.budget === undefined ? phase.concurrency : Math.min(phase.concurrency, phase.budget);
    const workers = Array.from({ length: workerCount }, () => worker());

    // Close only after every worker has settled; the first error surfaces in the consumer
    void Promise.allSettled(workers).then((results) => {
      phase.signal.removeEventListener('abort', forward);
      const failure = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
      if (failure) {
        const reason: unknown = failure.reason;
        channel.fail(reason instanceof Error ? reason : new Error(String(reason)));
      } else {
        channel.close();
      }
    });

    for await (const outcome of channel) {
      phase.onOutcome(outcome);
    }

    return dispatched;
  }

  private async executeWithRetry(prompt: PromptRecord, signal: AbortSignal): Promise<RequestOutcome> {
    const policy = this.retryPolicy;
    let attempt = 1;

    for (;;) {
      const outcome = await this.executor.execute(prompt, { signal, attempt });
      if (outcome.success || policy === undefined || !policy.shouldRetry(outcome.error.kind, attempt)) {
        policy?.recordFinal(outcome.success, attempt);
        return outcome;
      }

      const proceed = await policy.wait(outcome.error.kind, attempt, signal);
      if (!proceed) {
        policy.recordFinal(false, attempt);
        return outcome;
      }
      attempt++;
    }
  }
}
