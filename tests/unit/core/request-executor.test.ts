import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RequestExecutor } from '../../../src/core/request-executor.js';
import { resolveEndpointFormat } from '../../../src/transport/endpoint-formats.js';
import type { RequestTransport, TransportResponse } from '../../../src/transport/types.js';
import type { PromptRecord } from '../../../src/types/index.js';
import { chatBody, constantTransport, MockTransport } from '../../helpers/mock-transport.js';

const chat = resolveEndpointFormat('openai-chat', 'http://localhost/v1/chat/completions');
const prompt: PromptRecord = { id: 'p-1', text: 'three word prompt', targetTokens: 3 };

function executorFor(transport: RequestTransport, timeoutMs = 1000): RequestExecutor {
  return new RequestExecutor({ transport, format: chat, timeoutMs, clock: () => Date.now() });
}

describe('RequestExecutor', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should record a successful request with reported usage', async () => {
    const start = Date.now();
    const promise = executorFor(constantTransport(100, chatBody('fine', 50, 12))).execute(prompt);
    await vi.advanceTimersByTimeAsync(100);
    const outcome = await promise;

    expect(outcome).toEqual({
      id: 'p-1',
      success: true,
      startedAt: start,
      endedAt: start + 100,
      durationMs: 100,
      attempts: 1,
      inputTokens: 12,
      outputTokens: 50,
      statusCode: 200,
      tokensEstimated: false,
      error: null,
    });
    expect(Object.isFrozen(outcome)).toBe(true);
  });

  it('should estimate tokens when the endpoint reports no usage', async () => {
    const promise = executorFor(constantTransport(10, chatBody('one two three four'))).execute(prompt);
    await vi.advanceTimersByTimeAsync(10);
    const outcome = await promise;

    expect(outcome.success).toBe(true);
    expect(outcome.outputTokens).toBe(4);
    expect(outcome.inputTokens).toBe(3);
    if (outcome.success) {
      expect(outcome.tokensEstimated).toBe(true);
    }
  });

  it('should classify non-2xx responses as endpoint_error', async () => {
    const transport = new MockTransport(() => ({ delayMs: 20, status: 500, body: 'upstream failed' }));
    const promise = executorFor(transport).execute(prompt);
    await vi.advanceTimersByTimeAsync(20);
    const outcome = await promise;

    expect(outcome.success).toBe(false);
    expect(outcome.error).toEqual({ kind: 'endpoint_error', message: 'HTTP 500: upstream failed', statusCode: 500 });
    expect(outcome.outputTokens).toBe(0);
    expect(outcome.inputTokens).toBe(0);
    expect(outcome.durationMs).toBe(20);
  });

  it('should classify malformed bodies as parse_error', async () => {
    const transport = new MockTransport(() => ({ delayMs: 5, body: 'not json' }));
    const promise = executorFor(transport).execute(prompt);
    await vi.advanceTimersByTimeAsync(5);
    const outcome = await promise;

    expect(outcome.error?.kind).toBe('parse_error');
    expect(outcome.error?.statusCode).toBe(200);
  });

  it('should classify transport rejections as transport_error', async () => {
    const failure = new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED') });
    const transport = new MockTransport(() => ({ delayMs: 5, error: failure }));
    const promise = executorFor(transport).execute(prompt);
    await vi.advanceTimersByTimeAsync(5);
    const outcome = await promise;

    expect(outcome.error).toEqual({ kind: 'transport_error', message: 'fetch failed: connect ECONNREFUSED' });
  });

  it('should abort the in-flight call when the timeout expires', async () => {
    const transport = constantTransport(5000);
    const promise = executorFor(transport, 1000).execute(prompt);
    await vi.advanceTimersByTimeAsync(1000);
    const outcome = await promise;

    expect(outcome.error).toEqual({ kind: 'timeout', message: 'Request timed out after 1000ms' });
    expect(outcome.durationMs).toBe(1000);
    expect(transport.inFlight).toBe(0);
  });

  it('should time out a transport that ignores the signal', async () => {
    const stuck: RequestTransport = {
      send: () => new Promise<TransportResponse>(() => undefined),
    };
    const promise = executorFor(stuck, 250).execute(prompt);
    await vi.advanceTimersByTimeAsync(250);

    expect((await promise).error?.kind).toBe('timeout');
  });

  it('should report caller aborts as cancelled', async () => {
    const controller = new AbortController();
    const promise = executorFor(constantTransport(500)).execute(prompt, { signal: controller.signal });
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();
    const outcome = await promise;

    expect(outcome.error?.kind).toBe('cancelled');
    expect(outcome.durationMs).toBe(100);
  });

  it('should not call the transport when already cancelled', async () => {
    const transport = constantTransport(10);
    const controller = new AbortController();
    controller.abort();

    const outcome = await executorFor(transport).execute(prompt, { signal: controller.signal });

    expect(outcome.error?.kind).toBe('cancelled');
    expect(transport.calls).toHaveLength(0);
  });

  it('should record the attempt number it was given', async () => {
    const promise = executorFor(constantTransport(1)).execute(prompt, { attempt: 3 });
    await vi.advanceTimersByTimeAsync(1);
    expect((await promise).attempts).toBe(3);
  });

  it('should issue exactly one transport call per execution', async () => {
    const transport = new MockTransport(() => ({ delayMs: 1, status: 503 }));
    const promise = executorFor(transport).execute(prompt);
    await vi.advanceTimersByTimeAsync(1);
    await promise;

    expect(transport.calls).toHaveLength(1);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => executorFor(constantTransport(1), 0)).toThrow('timeoutMs must be > 0');
  });
});
