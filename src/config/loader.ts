/**
 * Configuration Loader
 *
 * Loads configuration from YAML files with environment-specific overrides
 */

import { readFileSync, existsSync } from 'node:fs';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as yaml from 'js-yaml';
import type { ZodIssue } from 'zod';
import { LoadTestError } from '../api/errors.js';
import type { FailedRequestPolicy, PromptExhaustionPolicy, RequestErrorKind } from '../types/index.js';
import { LoadTestConfigSchema, type LoadTestConfigShape } from '../types/schemas/config.js';
import { ENDPOINT, OUTPUT, PROMPTS, RETRY, SWEEP } from './defaults.js';

export type Environment = 'production' | 'development' | 'test';

type ConfigRecord = Record<string, unknown>;

/**
 * Validated configuration (matches loadtest.yaml structure)
 */
export type Config = LoadTestConfigShape;

/**
 * Runtime settings derived from Config
 */
export interface SweepSettings {
  endpoint: {
    url: string;
    authToken: string;
    model: string;
    format: LoadTestConfigShape['endpoint']['format'];
    timeoutMs: number;
    preflightTimeoutMs: number;
    maxTokens: number;
    temperature: number;
  };
  sweep: {
    concurrencyLevels: number[];
    repetitions: number;
    warmupRequests: number;
    /** null: one request per concurrent worker */
    requestsPerRun: number | null;
    cooldownMs: number;
    repetitionCooldownMs: number;
    runDurationMs: number | null;
    runDeadlineMs: number | null;
    failedRequestPolicy: FailedRequestPolicy;
    retry: {
      maxRetries: number;
      initialDelayMs: number;
      maxDelayMs: number;
      backoffMultiplier: number;
      jitter: number;
      retryableErrors: RequestErrorKind[];
    };
  };
  prompts: {
    poolSize: number;
    targetTokens: number;
    basePrompt: string;
    exhaustionPolicy: PromptExhaustionPolicy;
  };
  output: {
    directory: string;
    saveRawOutcomes: boolean;
    formats: Array<'csv' | 'json'>;
  };
  logging: {
    level: LoadTestConfigShape['logging']['level'];
  };
}

/**
 * Environment variables that override file values
 */
const ENV_OVERRIDES: ReadonlyArray<{ variable: string; path: [string, string] }> = [
  { variable: 'LOADTEST_API_URL', path: ['endpoint', 'url'] },
  { variable: 'LOADTEST_AUTH_TOKEN', path: ['endpoint', 'auth_token'] },
  { variable: 'LOADTEST_MODEL', path: ['endpoint', 'model'] },
  { variable: 'LOADTEST_LOG_LEVEL', path: ['logging', 'level'] },
];

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Built-in defaults, used as the base every file is merged onto
 */
export function buildDefaultConfig(): ConfigRecord {
  return {
    endpoint: {
      url: '',
      auth_token: '',
      model: ENDPOINT.DEFAULT_MODEL,
      format: 'auto',
      timeout_ms: ENDPOINT.TIMEOUT_MS,
      preflight_timeout_ms: ENDPOINT.PREFLIGHT_TIMEOUT_MS,
      max_tokens: ENDPOINT.MAX_TOKENS,
      temperature: ENDPOINT.TEMPERATURE,
    },
    sweep: {
      concurrency_levels: [...SWEEP.CONCURRENCY_LEVELS],
      repetitions: SWEEP.REPETITIONS,
      warmup_requests: SWEEP.WARMUP_REQUESTS,
      requests_per_run: null,
      cooldown_ms: SWEEP.COOLDOWN_MS,
      repetition_cooldown_ms: SWEEP.REPETITION_COOLDOWN_MS,
      run_duration_ms: null,
      run_deadline_ms: null,
      failed_request_policy: 'exclude',
      retry: {
        max_retries: RETRY.MAX_RETRIES,
        initial_delay_ms: RETRY.INITIAL_DELAY_MS,
        max_delay_ms: RETRY.MAX_DELAY_MS,
        backoff_multiplier: RETRY.BACKOFF_MULTIPLIER,
        jitter: RETRY.JITTER,
        retryable_errors: ['timeout', 'transport_error'],
      },
    },
    prompts: {
      pool_size: PROMPTS.POOL_SIZE,
      target_tokens: PROMPTS.TARGET_TOKENS,
      base_prompt: PROMPTS.BASE_PROMPT,
      exhaustion_policy: 'cycle',
    },
    output: {
      directory: OUTPUT.DIRECTORY,
      save_raw_outcomes: true,
      formats: ['csv', 'json'],
    },
    logging: {
      level: 'info',
    },
  };
}

/**
 * Deep merge two objects (arrays and scalars from source replace target)
 */
export function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const output: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = output[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      output[key] = deepMerge(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      output[key] = sourceValue;
    }
  }

  return output;
}

/**
 * Find the package root directory by looking for package.json
 */
function findPackageRoot(): string {
  let currentDir = dirname(fileURLToPath(import.meta.url));

  while (currentDir !== dirname(currentDir)) {
    if (existsSync(join(currentDir, 'package.json'))) {
      return currentDir;
    }
    currentDir = dirname(currentDir);
  }

  return process.cwd();
}

export function defaultConfigPath(): string {
  return join(findPackageRoot(), 'config', 'loadtest.yaml');
}

function readConfigFile(path: string): ConfigRecord {
  let contents: string;
  try {
    contents = readFileSync(path, 'utf8');
  } catch (error) {
    const code = isRecord(error) ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new LoadTestError('ConfigError', `Configuration file not found: ${path}`, { path });
    }
    throw new LoadTestError('ConfigError', `Failed to read configuration: ${String(error)}`, { path });
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new LoadTestError('ConfigError', `Invalid YAML in ${path}: ${message}`, { path });
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new LoadTestError('ConfigError', `Configuration root must be a mapping: ${path}`, { path });
  }
  return parsed;
}

function applyEnvOverrides(config: ConfigRecord, env: NodeJS.ProcessEnv): ConfigRecord {
  let output = config;
  for (const { variable, path } of ENV_OVERRIDES) {
    const value = env[variable];
    if (value === undefined || value === '') {
      continue;
    }
    const [section, key] = path;
    output = deepMerge(output, { [section]: { [key]: value } });
  }
  return output;
}

export interface LoadConfigOptions {
  /** Explicit YAML path; defaults to config/loadtest.yaml under the package root */
  configPath?: string;
  environment?: Environment;
  /** Defaults to process.env */
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from YAML, apply environment section and variables.
 * The result is not validated yet.
 */
export function loadConfig(options: LoadConfigOptions = {}): ConfigRecord {
  const env = options.env ?? process.env;
  const path = options.configPath ?? defaultConfigPath();

  // Without an explicit path a missing default file just means "use defaults"
  const fileConfig = (options.configPath || existsSync(path)) ? readConfigFile(path) : {};

  const { environments, ...baseConfig } = fileConfig;
  let merged = deepMerge(buildDefaultConfig(), baseConfig);

  const environment = options.environment ?? env.NODE_ENV ?? 'development';
  if (isRecord(environments)) {
    const envConfig = environments[environment];
    if (isRecord(envConfig)) {
      merged = deepMerge(merged, envConfig);
    }
  }

  return applyEnvOverrides(merged, env);
}

function formatIssue(issue: ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join('.') : 'root';
  return `${field} ${issue.message}`;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: unknown): Config {
  const parseResult = LoadTestConfigSchema.safeParse(config);
  if (!parseResult.success) {
    const errors = parseResult.error.issues.map(formatIssue);
    throw new LoadTestError(
      'ValidationError',
      `Configuration validation failed:\n${errors.join('\n')}`,
      { issues: errors }
    );
  }
  return parseResult.data;
}

/**
 * Convert YAML config (snake_case) to runtime settings (camelCase)
 */
export function toSweepSettings(config: Config): SweepSettings {
  const { endpoint, sweep, prompts, output, logging } = config;

  return {
    endpoint: {
      url: endpoint.url,
      authToken: endpoint.auth_token,
      model: endpoint.model,
      format: endpoint.format,
      timeoutMs: endpoint.timeout_ms,
      preflightTimeoutMs: endpoint.preflight_timeout_ms,
      maxTokens: endpoint.max_tokens,
      temperature: endpoint.temperature,
    },
    sweep: {
      concurrencyLevels: [...sweep.concurrency_levels],
      repetitions: sweep.repetitions,
      warmupRequests: sweep.warmup_requests,
      requestsPerRun: sweep.requests_per_run,
      cooldownMs: sweep.cooldown_ms,
      repetitionCooldownMs: sweep.repetition_cooldown_ms,
      runDurationMs: sweep.run_duration_ms,
      runDeadlineMs: sweep.run_deadline_ms,
      failedRequestPolicy: sweep.failed_request_policy,
      retry: {
        maxRetries: sweep.retry.max_retries,
        initialDelayMs: sweep.retry.initial_delay_ms,
        maxDelayMs: sweep.retry.max_delay_ms,
        backoffMultiplier: sweep.retry.backoff_multiplier,
        jitter: sweep.retry.jitter,
        retryableErrors: [...sweep.retry.retryable_errors],
      },
    },
    prompts: {
      poolSize: prompts.pool_size,
      targetTokens: prompts.target_tokens,
      basePrompt: prompts.base_prompt,
      exhaustionPolicy: prompts.exhaustion_policy,
    },
    output: {
      directory: output.directory,
      saveRawOutcomes: output.save_raw_outcomes,
      formats: [...output.formats],
    },
    logging: {
      level: logging.level,
    },
  };
}

/**
 * Load, validate and convert in one step
 */
export function loadSettings(options: LoadConfigOptions = {}): SweepSettings {
  return toSweepSettings(validateConfig(loadConfig(options)));
}
