/**
 * Load test composition
 *
 * Wires SweepSettings into transport, executor, runner, aggregator and
 * sweeper. Callers may inject their own transport or prompt source.
 */

import type { Logger } from 'pino';
import type { SweepSettings } from '../config/loader.js';
import { ConcurrencyRunner } from '../core/concurrency-runner.js';
import { PromptPool, UuidPromptGenerator, type PromptSource } from '../core/prompt-pool.js';
import { RequestExecutor, type Clock } from '../core/request-executor.js';
import { RetryPolicy } from '../core/retry-policy.js';
import { ScalingSweeper } from '../core/scaling-sweeper.js';
import { TrialAggregator } from '../core/trial-aggregator.js';
import { resolveEndpointFormat, type EndpointFormat } from '../transport/endpoint-formats.js';
import { HttpTransport } from '../transport/http-transport.js';
import type { RequestTransport } from '../transport/types.js';

export interface LoadTestDependencies {
  transport?: RequestTransport;
  promptSource?: PromptSource;
  clock?: Clock;
  logger?: Logger;
}

export interface LoadTest {
  sweeper: ScalingSweeper;
  aggregator: TrialAggregator;
  runner: ConcurrencyRunner;
  retryPolicy: RetryPolicy;
  format: EndpointFormat;
}

export function createLoadTest(settings: SweepSettings, deps: LoadTestDependencies = {}): LoadTest {
  const { endpoint, sweep, prompts } = settings;
  const logger = deps.logger;

  const format = resolveEndpointFormat(endpoint.format, endpoint.url);
  const transport =
    deps.transport ??
    new HttpTransport({
      settings: {
        url: endpoint.url,
        authToken: endpoint.authToken,
        model: endpoint.model,
        maxTokens: endpoint.maxTokens,
        temperature: endpoint.temperature,
      },
      format,
      logger,
    });

  const executor = new RequestExecutor({
    transport,
    format,
    timeoutMs: endpoint.timeoutMs,
    clock: deps.clock,
    logger,
  });

  const retryPolicy = new RetryPolicy({ ...sweep.retry, logger });
  const runner = new ConcurrencyRunner({ executor, retryPolicy, clock: deps.clock, logger });

  const promptSource = deps.promptSource ?? new UuidPromptGenerator(prompts.basePrompt);
  const aggregator = new TrialAggregator({
    runner,
    createPool: () =>
      new PromptPool({
        source: promptSource,
        size: prompts.poolSize,
        targetTokens: prompts.targetTokens,
        exhaustionPolicy: prompts.exhaustionPolicy,
      }),
    repetitions: sweep.repetitions,
    warmupRequests: sweep.warmupRequests,
    requestsPerRun: sweep.requestsPerRun,
    runDurationMs: sweep.runDurationMs,
    runDeadlineMs: sweep.runDeadlineMs,
    repetitionCooldownMs: sweep.repetitionCooldownMs,
    failedRequestPolicy: sweep.failedRequestPolicy,
    logger,
  });

  const sweeper = new ScalingSweeper({
    aggregator,
    concurrencyLevels: sweep.concurrencyLevels,
    transport,
    preflightTimeoutMs: endpoint.preflightTimeoutMs,
    cooldownMs: sweep.cooldownMs,
    retainRuns: settings.output.saveRawOutcomes,
    logger,
  });

  return { sweeper, aggregator, runner, retryPolicy, format };
}
