import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { ConcurrencyRunner } from '../../../src/core/concurrency-runner.js';
import { PromptPool } from '../../../src/core/prompt-pool.js';
import { RequestExecutor } from '../../../src/core/request-executor.js';
import { summarize, summarizeLevel, TrialAggregator, type TrialAggregatorOptions } from '../../../src/core/trial-aggregator.js';
import { resolveEndpointFormat } from '../../../src/transport/endpoint-formats.js';
import type { LevelRun, RunMetrics } from '../../../src/types/index.js';
import { constantTransport, CountingPromptSource, MockTransport } from '../../helpers/mock-transport.js';

const chat = resolveEndpointFormat('openai-chat', 'http://localhost/v1/chat/completions');
const clock = (): number => Date.now();

function createAggregator(
  transport: MockTransport,
  overrides: Partial<TrialAggregatorOptions> = {}
): { aggregator: TrialAggregator; pools: PromptPool[] } {
  const executor = new RequestExecutor({ transport, format: chat, timeoutMs: 10_000, clock });
  const runner = new ConcurrencyRunner({ executor, clock });
  const source = new CountingPromptSource();
  const pools: PromptPool[] = [];
  const aggregator = new TrialAggregator({
    runner,
    createPool: () => {
      const pool = new PromptPool({ source, size: 50, targetTokens: 10, exhaustionPolicy: 'cycle' });
      pools.push(pool);
      return pool;
    },
    repetitions: 2,
    warmupRequests: 0,
    requestsPerRun: 4,
    ...overrides,
  });
  return { aggregator, pools };
}

describe('summarize', () => {
  it('should report a zero spread for a single value', () => {
    expect(summarize([0.25])).toEqual({ mean: 0.25, stdDev: 0 });
  });

  it('should use the sample standard deviation', () => {
    const summary = summarize([2, 4, 4, 4, 5, 5, 7, 9]);
    expect(summary.mean).toBe(5);
    expect(summary.stdDev).toBeCloseTo(2.138, 3);
  });
});

describe('summarizeLevel', () => {
  it('should record an error with zeroed metrics', () => {
    const summary = summarizeLevel(8, 10, [], 'boom');

    expect(summary.error).toBe('boom');
    expect(summary.repetitions).toBe(0);
    expect(summary.successRate).toEqual({ mean: 0, stdDev: 0 });
    expect(summary.requestsPerSecond).toEqual({ mean: 0, stdDev: 0 });
  });

  it('should omit the error key for healthy levels', () => {
    expect('error' in summarizeLevel(1, 1, [])).toBe(false);
  });
});

describe('TrialAggregator', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should report zero spread with a single repetition', async () => {
    const { aggregator } = createAggregator(constantTransport(100), { repetitions: 1 });

    const promise = aggregator.aggregate(2);
    await vi.runAllTimersAsync();
    const summary = await promise;

    expect(summary.repetitions).toBe(1);
    expect(summary.requestsPerRun).toBe(4);
    expect(summary.avgResponseTime.mean).toBeCloseTo(0.1);
    expect(summary.requestsPerSecond.mean).toBeCloseTo(20);
    expect(summary.requestsPerSecond.stdDev).toBe(0);
    expect(summary.successRate).toEqual({ mean: 1, stdDev: 0 });
  });

  it('should summarize across repetitions rather than pooling', async () => {
    const transport = new MockTransport((_prompt, call) => ({ delayMs: call < 4 ? 100 : 200 }));
    const { aggregator } = createAggregator(transport);

    const promise = aggregator.aggregate(1);
    await vi.runAllTimersAsync();
    const summary = await promise;

    expect(summary.runs[0]?.avgResponseTime).toBeCloseTo(0.1);
    expect(summary.runs[1]?.avgResponseTime).toBeCloseTo(0.2);
    expect(summary.avgResponseTime.mean).toBeCloseTo(0.15);
    expect(summary.avgResponseTime.stdDev).toBeCloseTo(Math.SQRT2 * 0.05);
    expect(summary.requestsPerSecond.mean).toBeCloseTo(7.5);
  });

  it('should use a fresh prompt pool per repetition', async () => {
    const { aggregator, pools } = createAggregator(constantTransport(10), { repetitions: 3 });

    const promise = aggregator.aggregate(2);
    await vi.runAllTimersAsync();
    await promise;

    expect(pools).toHaveLength(3);
    expect(pools.map((pool) => pool.consumed)).toEqual([4, 4, 4]);
  });

  it('should leave failed repetitions out of the response time mean', async () => {
    const transport = new MockTransport((_prompt, call) =>
      call < 4 ? { delayMs: 100 } : { delayMs: 100, status: 500, body: 'down' }
    );
    const { aggregator } = createAggregator(transport);

    const promise = aggregator.aggregate(1);
    await vi.runAllTimersAsync();
    const summary = await promise;

    expect(summary.avgResponseTime.mean).toBeCloseTo(0.1);
    expect(summary.avgResponseTime.stdDev).toBe(0);
    expect(summary.successRate.mean).toBe(0.5);
    expect(summary.runs[1]?.errorCounts).toEqual({ endpoint_error: 4 });
  });

  it('should cool down between repetitions', async () => {
    const { aggregator } = createAggregator(constantTransport(100), {
      requestsPerRun: 1,
      repetitionCooldownMs: 1000,
    });
    const runs: LevelRun[] = [];
    aggregator.on('repetitionCompleted', (run) => runs.push(run));

    const promise = aggregator.aggregate(1);
    await vi.runAllTimersAsync();
    await promise;

    expect(runs).toHaveLength(2);
    const [first, second] = runs;
    expect(first && second ? second.startedAt - first.endedAt : undefined).toBe(1000);
  });

  it('should emit per-repetition metrics', async () => {
    const { aggregator } = createAggregator(constantTransport(10), { repetitions: 3 });
    const metrics: RunMetrics[] = [];
    aggregator.on('repetitionCompleted', (_run, runMetrics) => metrics.push(runMetrics));

    const promise = aggregator.aggregate(2);
    await vi.runAllTimersAsync();
    await promise;

    expect(metrics.map((entry) => entry.repetition)).toEqual([1, 2, 3]);
  });

  it('should keep finished repetitions when a later one fails', async () => {
    const source = new CountingPromptSource();
    let created = 0;
    const { aggregator } = createAggregator(constantTransport(100), {
      repetitions: 3,
      createPool: () => {
        created++;
        if (created === 3) {
          throw new Error('prompt source unavailable');
        }
        return new PromptPool({ source, size: 50, targetTokens: 10, exhaustionPolicy: 'cycle' });
      },
    });
    const completed: RunMetrics[] = [];
    aggregator.on('repetitionCompleted', (_run, runMetrics) => completed.push(runMetrics));

    const promise = aggregator.aggregate(2);
    await vi.runAllTimersAsync();
    const summary = await promise;

    expect(summary.error).toBe('prompt source unavailable');
    expect(summary.repetitions).toBe(2);
    expect(summary.requestsPerRun).toBe(4);
    expect(summary.runs.map((run) => run.successes)).toEqual([4, 4]);
    expect(summary.successRate).toEqual({ mean: 1, stdDev: 0 });
    expect(summary.avgResponseTime.mean).toBeCloseTo(0.1);
    expect(completed).toHaveLength(2);
  });

  it('should let the duration bound the run when no request count is set', async () => {
    const { aggregator } = createAggregator(constantTransport(100), { requestsPerRun: null, runDurationMs: 250 });

    expect(aggregator.requestCount(2)).toBeUndefined();

    const promise = aggregator.aggregate(2);
    await vi.runAllTimersAsync();
    const summary = await promise;

    expect(summary.requestsPerRun).toBe(6);
  });

  it('should default to one request per worker', () => {
    const { aggregator } = createAggregator(constantTransport(10), { requestsPerRun: null });
    expect(aggregator.requestCount(3)).toBe(3);
  });

  it('should reject a non-positive repetition count', () => {
    expect(() => createAggregator(constantTransport(10), { repetitions: 0 })).toThrow(
      'repetitions must be a positive integer, got 0'
    );
  });
});
