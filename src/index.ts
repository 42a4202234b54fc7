export { createLoadTest, type LoadTest, type LoadTestDependencies } from './api/load-test.js';
export { LoadTestError, toLoadTestError, describeError, type LoadTestErrorCode } from './api/errors.js';

export { RequestExecutor, highResolutionClock, type Clock, type RequestExecutorOptions } from './core/request-executor.js';
export { ConcurrencyRunner, type ConcurrencyRunnerEvents, type RunOptions } from './core/concurrency-runner.js';
export { TrialAggregator, summarizeLevel, type TrialAggregatorOptions } from './core/trial-aggregator.js';
export { ScalingSweeper, type ScalingSweeperEvents, type ScalingSweeperOptions } from './core/scaling-sweeper.js';
export { computeRunMetrics } from './core/run-metrics.js';
export { PromptPool, UuidPromptGenerator, type PromptSource } from './core/prompt-pool.js';
export { OutcomeChannel } from './core/outcome-channel.js';
export { RetryPolicy, type RetryPolicyConfig, type RetryPolicyStats } from './core/retry-policy.js';

export { HttpTransport, type HttpTransportOptions } from './transport/http-transport.js';
export {
  detectEndpointFormat,
  resolveEndpointFormat,
  estimateTokenCount,
  type EndpointFormat,
  type EndpointFormatName,
} from './transport/endpoint-formats.js';
export type { RequestTransport, TransportResponse, TransportSettings } from './transport/types.js';

export { loadConfig, loadSettings, validateConfig, toSweepSettings, type SweepSettings } from './config/loader.js';

export { toSummaryRows, toOutcomeRows, type SummaryRow, type OutcomeRow } from './report/records.js';
export { writeReports, toCsv } from './report/writers.js';
export { formatSummaryTable } from './report/console.js';

export * from './types/index.js';
