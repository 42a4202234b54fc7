#!/usr/bin/env node
/**
 * Load test CLI
 *
 * Sweeps the configured concurrency levels against an inference
 * endpoint, prints a summary table and writes CSV/JSON reports.
 *
 * Usage:
 *   inference-loadtest                               # config/loadtest.yaml
 *   inference-loadtest --url https://host/v1/chat/completions -l 1,2,4
 *   inference-loadtest --config my.yaml --env production
 */

import { realpathSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parseArgs } from 'node:util';
import type { Logger } from 'pino';
import { describeError, LoadTestError, toLoadTestError } from '../api/errors.js';
import { createLoadTest } from '../api/load-test.js';
import {
  deepMerge,
  loadConfig,
  toSweepSettings,
  validateConfig,
  type Environment,
  type SweepSettings,
} from '../config/loader.js';
import { formatSummaryTable } from '../report/console.js';
import { writeReports } from '../report/writers.js';
import type { RequestTransport } from '../transport/types.js';
import type { SweepResult } from '../types/index.js';
import { createLogger } from '../utils/logger-helpers.js';

export interface CliDependencies {
  transport?: RequestTransport;
  logger?: Logger;
  /** Table output (default: console.log) */
  print?: (text: string) => void;
  env?: NodeJS.ProcessEnv;
}

const OPTIONS = {
  config: { type: 'string', short: 'c' },
  env: { type: 'string', short: 'e' },
  url: { type: 'string', short: 'u' },
  model: { type: 'string', short: 'm' },
  'concurrency-levels': { type: 'string', short: 'l' },
  repetitions: { type: 'string', short: 'r' },
  warmup: { type: 'string', short: 'w' },
  requests: { type: 'string', short: 'n' },
  'cooldown-ms': { type: 'string' },
  'output-dir': { type: 'string', short: 'o' },
  'log-level': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

const ENVIRONMENTS: readonly Environment[] = ['production', 'development', 'test'];

export const HELP_TEXT = `
inference-loadtest - concurrency scaling benchmark for inference endpoints

Usage: inference-loadtest [options]

Options:
  -c, --config <path>              YAML configuration (default: config/loadtest.yaml)
  -e, --env <name>                 Environment section: production | development | test
  -u, --url <url>                  Endpoint URL
  -m, --model <name>               Model name sent with chat/completions requests
  -l, --concurrency-levels <list>  Comma-separated levels, run in order (e.g. 1,2,4)
  -r, --repetitions <n>            Repetitions per level
  -w, --warmup <n>                 Warm-up requests before each run
  -n, --requests <n>               Measured requests per run
      --cooldown-ms <ms>           Pause between levels
  -o, --output-dir <dir>           Report directory
      --log-level <level>          trace | debug | info | warn | error | fatal | silent
  -h, --help                       Show this help

Environment: LOADTEST_API_URL, LOADTEST_AUTH_TOKEN, LOADTEST_MODEL, LOADTEST_LOG_LEVEL
`.trim();

type FlagValues = ReturnType<typeof parseFlags>['values'];

function parseFlags(argv: readonly string[]) {
  return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: false, strict: true });
}

function isEnvironment(value: string): value is Environment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

function toNumber(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Map CLI flags onto the snake_case config tree. Values stay unvalidated
 * here; the config schema rejects anything malformed.
 */
export function flagOverrides(values: FlagValues): Record<string, unknown> {
  const endpoint: Record<string, unknown> = {};
  const sweep: Record<string, unknown> = {};
  const overrides: Record<string, unknown> = {};

  if (values.url !== undefined) endpoint.url = values.url;
  if (values.model !== undefined) endpoint.model = values.model;
  if (values['concurrency-levels'] !== undefined) {
    sweep.concurrency_levels = values['concurrency-levels']
      .split(',')
      .filter((part) => part.trim() !== '')
      .map(toNumber);
  }
  if (values.repetitions !== undefined) sweep.repetitions = toNumber(values.repetitions);
  if (values.warmup !== undefined) sweep.warmup_requests = toNumber(values.warmup);
  if (values.requests !== undefined) sweep.requests_per_run = toNumber(values.requests);
  if (values['cooldown-ms'] !== undefined) sweep.cooldown_ms = toNumber(values['cooldown-ms']);

  if (Object.keys(endpoint).length > 0) overrides.endpoint = endpoint;
  if (Object.keys(sweep).length > 0) overrides.sweep = sweep;
  if (values['output-dir'] !== undefined) overrides.output = { directory: values['output-dir'] };
  if (values['log-level'] !== undefined) overrides.logging = { level: values['log-level'] };

  return overrides;
}

function resolveSettings(values: FlagValues, env: NodeJS.ProcessEnv): SweepSettings {
  let environment: Environment | undefined;
  if (values.env !== undefined) {
    if (!isEnvironment(values.env)) {
      throw new LoadTestError('ConfigError', `Unknown environment "${values.env}"`, {
        allowed: ENVIRONMENTS,
      });
    }
    environment = values.env;
  }

  const fileConfig = loadConfig({ configPath: values.config, environment, env });
  return toSweepSettings(validateConfig(deepMerge(fileConfig, flagOverrides(values))));
}

/**
 * Run the CLI and resolve with the process exit code
 */
export async function runCli(argv: readonly string[], deps: CliDependencies = {}): Promise<number> {
  const print = deps.print ?? ((text: string) => console.log(text));

  let values: FlagValues;
  try {
    values = parseFlags(argv).values;
  } catch (error) {
    print(`${describeError(error)}\n\n${HELP_TEXT}`);
    return 1;
  }

  if (values.help) {
    print(HELP_TEXT);
    return 0;
  }

  let settings: SweepSettings;
  try {
    settings = resolveSettings(values, deps.env ?? process.env);
  } catch (error) {
    const loadError = toLoadTestError(error, 'ConfigError');
    (deps.logger ?? createLogger()).error({ error: loadError.toObject() }, 'Invalid configuration');
    return 1;
  }

  const logger = deps.logger ?? createLogger(settings.logging.level);
  const { sweeper, format, retryPolicy } = createLoadTest(settings, { transport: deps.transport, logger });

  logger.info(
    {
      url: settings.endpoint.url,
      format: format.name,
      concurrencyLevels: settings.sweep.concurrencyLevels,
      repetitions: settings.sweep.repetitions,
    },
    'Starting load test'
  );

  let result: SweepResult;
  try {
    result = await sweeper.run();
  } catch (error) {
    const sweepError = toLoadTestError(error);
    logger.error({ error: sweepError.toObject() }, 'Load test aborted');
    return 1;
  }

  print(formatSummaryTable(result.levels));
  if (retryPolicy.enabled) {
    logger.info(retryPolicy.getStats(), 'Retry statistics');
  }

  try {
    await writeReports(result, {
      directory: settings.output.directory,
      formats: settings.output.formats,
      concurrencyLevels: settings.sweep.concurrencyLevels,
      endpointType: format.name,
      includeOutcomes: settings.output.saveRawOutcomes,
      logger,
    });
  } catch (error) {
    // The sweep itself completed; a report failure is logged, not fatal
    logger.error({ error: describeError(error) }, 'Failed to save reports');
  }

  return 0;
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (entry === undefined) {
    return false;
  }
  try {
    return realpathSync(entry) === realpathSync(fileURLToPath(import.meta.url));
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  runCli(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error(describeError(error));
      process.exitCode = 1;
    }
  );
}
