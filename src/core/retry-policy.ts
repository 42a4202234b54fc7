/**
 * RetryPolicy - Exponential backoff with jitter for failed requests
 *
 * The executor never retries on its own; the runner asks this policy
 * whether a failed outcome should be re-issued and how long to wait.
 *
 * Algorithm:
 * - Base delay = initialDelay * (multiplier ^ (attempt - 1))
 * - Capped delay = min(maxDelay, baseDelay)
 * - Final delay = cappedDelay * (1 + random(-jitter, +jitter))
 *
 * @module retry-policy
 */

import type { Logger } from 'pino';
import type { RequestErrorKind } from '../types/index.js';
import { sleep } from '../utils/sleep.js';

export interface RetryPolicyConfig {
  /** Retries after the first attempt (0 disables retrying) */
  maxRetries: number;

  initialDelayMs: number;

  maxDelayMs: number;

  backoffMultiplier: number;

  /** Jitter factor 0-1 for ±% variation */
  jitter: number;

  /** Failure kinds worth another attempt; `cancelled` is never retried */
  retryableErrors: readonly RequestErrorKind[];

  logger?: Logger;

  /** Source of randomness for jitter (default: Math.random) */
  random?: () => number;
}

export interface RetryPolicyStats {
  totalRetries: number;

  /** Prompts that succeeded only after at least one retry */
  recoveredAfterRetry: number;

  /** Prompts still failing once retries ran out */
  exhausted: number;

  retriesByKind: Partial<Record<RequestErrorKind, number>>;
}

export class RetryPolicy {
  private readonly config: RetryPolicyConfig;
  private readonly logger?: Logger;
  private readonly random: () => number;

  private stats: RetryPolicyStats = {
    totalRetries: 0,
    recoveredAfterRetry: 0,
    exhausted: 0,
    retriesByKind: {},
  };

  constructor(config: RetryPolicyConfig) {
    if (!Number.isInteger(config.maxRetries) || config.maxRetries < 0) {
      throw new Error('maxRetries must be a non-negative integer');
    }
    if (config.initialDelayMs < 0) {
      throw new Error('initialDelayMs must be >= 0');
    }
    if (config.maxDelayMs < config.initialDelayMs) {
      throw new Error('maxDelayMs must be >= initialDelayMs');
    }
    if (config.backoffMultiplier < 1) {
      throw new Error('backoffMultiplier must be >= 1');
    }
    if (config.jitter < 0 || config.jitter > 1) {
      throw new Error('jitter must be in range [0, 1]');
    }

    this.config = config;
    this.logger = config.logger;
    this.random = config.random ?? Math.random;
  }

  public get enabled(): boolean {
    return this.config.maxRetries > 0;
  }

  /**
   * @param attempt - Attempt that just failed (1-indexed)
   */
  public shouldRetry(kind: RequestErrorKind, attempt: number): boolean {
    if (kind === 'cancelled') {
      return false;
    }
    if (attempt > this.config.maxRetries) {
      return false;
    }
    return this.config.retryableErrors.includes(kind);
  }

  /**
   * Example with initialDelay=100ms, multiplier=2.0, jitter=0.25:
   * - Attempt 1: 75-125ms
   * - Attempt 2: 150-250ms
   * - Attempt 3: 300-500ms
   *
   * @param attempt - Attempt that just failed (1-indexed)
   */
  public calculateDelay(attempt: number): number {
    const exponentialDelay =
      this.config.initialDelayMs * Math.pow(this.config.backoffMultiplier, attempt - 1);

    const cappedDelay = Math.min(exponentialDelay, this.config.maxDelayMs);

    const jitterRange = cappedDelay * this.config.jitter;
    const jitter = (this.random() * 2 - 1) * jitterRange;

    return Math.round(Math.max(0, cappedDelay + jitter));
  }

  /**
   * Wait out the backoff. Resolves false when `signal` aborts first.
   */
  public async wait(kind: RequestErrorKind, attempt: number, signal?: AbortSignal): Promise<boolean> {
    const delayMs = this.calculateDelay(attempt);

    this.stats.totalRetries++;
    this.stats.retriesByKind[kind] = (this.stats.retriesByKind[kind] ?? 0) + 1;

    this.logger?.debug({ kind, attempt, delayMs }, 'Retrying request after delay');

    return sleep(delayMs, signal);
  }

  /**
   * Record how a prompt ended once no further retry will be issued
   */
  public recordFinal(success: boolean, attempts: number): void {
    if (success && attempts > 1) {
      this.stats.recoveredAfterRetry++;
    } else if (!success && attempts > 1) {
      this.stats.exhausted++;
    }
  }

  public getStats(): RetryPolicyStats {
    return {
      ...this.stats,
      retriesByKind: { ...this.stats.retriesByKind },
    };
  }

  public reset(): void {
    this.stats = {
      totalRetries: 0,
      recoveredAfterRetry: 0,
      exhausted: 0,
      retriesByKind: {},
    };
  }
}
