/**
 * Load test record types
 *
 * Shapes shared by the executor, the runner, the aggregator and the
 * report writers. Records are created once and never mutated afterwards.
 */

/**
 * Failure classification for a single request.
 *
 * `cancelled` is only produced when the caller aborts a request (run
 * deadline); the runner drops those from the sealed LevelRun.
 */
export type RequestErrorKind =
  | 'timeout'
  | 'transport_error'
  | 'endpoint_error'
  | 'parse_error'
  | 'cancelled';

/**
 * Input handed to the executor. Produced by a PromptSource.
 */
export interface PromptRecord {
  readonly id: string;
  readonly text: string;
  /** Token length the generator aimed for (hint only) */
  readonly targetTokens: number;
}

export interface RequestError {
  readonly kind: RequestErrorKind;
  readonly message: string;
  readonly statusCode?: number;
}

interface OutcomeBase {
  /** PromptRecord id */
  readonly id: string;
  /** Epoch milliseconds (fractional) */
  readonly startedAt: number;
  readonly endedAt: number;
  readonly durationMs: number;
  /** Number of attempts issued for this prompt (1 without retries) */
  readonly attempts: number;
  readonly inputTokens: number;
  readonly outputTokens: number;
}

export interface SuccessfulOutcome extends OutcomeBase {
  readonly success: true;
  readonly statusCode: number;
  /** True when token counts were estimated from text length */
  readonly tokensEstimated: boolean;
  readonly error: null;
}

export interface FailedOutcome extends OutcomeBase {
  readonly success: false;
  readonly error: RequestError;
}

export type RequestOutcome = SuccessfulOutcome | FailedOutcome;

/**
 * Outcomes of one concurrency level × one repetition.
 */
export interface LevelRun {
  readonly concurrency: number;
  /** 1-based */
  readonly repetition: number;
  /** Measured requests handed to the executor */
  readonly dispatched: number;
  readonly outcomes: readonly RequestOutcome[];
  readonly startedAt: number;
  readonly endedAt: number;
  /** Sealed early by the run deadline */
  readonly truncated: boolean;
  /** In-flight requests aborted by the run deadline */
  readonly cancelled: number;
}

export interface LatencyPercentiles {
  readonly p50: number;
  readonly p95: number;
  readonly p99: number;
}

/**
 * Derived metrics of one LevelRun. Times in seconds.
 */
export interface RunMetrics {
  readonly repetition: number;
  readonly total: number;
  readonly successes: number;
  readonly failures: number;
  readonly successRate: number;
  readonly avgResponseTime: number;
  readonly requestsPerSecond: number;
  readonly outputTokenThroughput: number;
  readonly combinedTokenThroughput: number;
  readonly windowSeconds: number;
  readonly outputTokens: number;
  readonly inputTokens: number;
  readonly latency: LatencyPercentiles;
  readonly errorCounts: Readonly<Partial<Record<RequestErrorKind, number>>>;
  readonly truncated: boolean;
}

export interface MetricSummary {
  readonly mean: number;
  readonly stdDev: number;
}

/**
 * Names of the five metrics summarized per level
 */
export type SummaryMetric =
  | 'avgResponseTime'
  | 'requestsPerSecond'
  | 'outputTokenThroughput'
  | 'combinedTokenThroughput'
  | 'successRate';

export interface LevelSummary extends Readonly<Record<SummaryMetric, MetricSummary>> {
  readonly concurrency: number;
  readonly repetitions: number;
  readonly requestsPerRun: number;
  readonly runs: readonly RunMetrics[];
  readonly truncatedRuns: number;
  /** Set when the level could not complete all repetitions */
  readonly error?: string;
}

export interface SweepResult {
  readonly startedAt: string;
  readonly completedAt: string;
  readonly levels: readonly LevelSummary[];
  /** Raw runs, only when retention is enabled */
  readonly runs: readonly LevelRun[];
}

/**
 * How failed requests enter token throughput:
 * - exclude: the timing window spans successful requests only
 * - include: failures count as zero-token requests inside the window
 */
export type FailedRequestPolicy = 'exclude' | 'include';

export type PromptExhaustionPolicy = 'cycle' | 'replenish';
