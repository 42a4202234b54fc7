/**
 * Default Configuration Constants
 *
 * Every tunable used by the sweep, centralized for easy tuning.
 * config/loadtest.yaml mirrors these values.
 */

/**
 * Target endpoint defaults
 */
export const ENDPOINT = {
  /** Model identifier sent to OpenAI-compatible endpoints */
  DEFAULT_MODEL: 'meta-llama/Llama-3.3-70B-Instruct',

  /** Per-request timeout (ms) */
  TIMEOUT_MS: 120_000, // 2 minutes

  /** Connectivity check timeout (ms) */
  PREFLIGHT_TIMEOUT_MS: 10_000,

  /** Maximum tokens to generate per response */
  MAX_TOKENS: 64,

  TEMPERATURE: 0.7,
} as const;

/**
 * Sweep defaults
 */
export const SWEEP = {
  /** Concurrency levels, in the order they run */
  CONCURRENCY_LEVELS: [2, 4, 8, 16, 32] as readonly number[],

  /** Repetitions per level for mean/stddev */
  REPETITIONS: 3,

  /** Discarded requests before each measured run */
  WARMUP_REQUESTS: 5,

  /** Break between concurrency levels (ms) */
  COOLDOWN_MS: 5_000,

  /** Break between repetitions of one level (ms) */
  REPETITION_COOLDOWN_MS: 0,
} as const;

/**
 * Runner retry defaults (disabled: retries distort measured latency)
 */
export const RETRY = {
  MAX_RETRIES: 0,
  INITIAL_DELAY_MS: 250,
  MAX_DELAY_MS: 5_000,
  BACKOFF_MULTIPLIER: 2,
  JITTER: 0,
} as const;

/**
 * Prompt pool defaults
 */
export const PROMPTS = {
  POOL_SIZE: 1_000,
  TARGET_TOKENS: 500,
  BASE_PROMPT:
    'Summarize the trade-offs between batching and streaming when serving large language models.',
} as const;

/**
 * Report output defaults
 */
export const OUTPUT = {
  DIRECTORY: 'load_test_results',
} as const;
