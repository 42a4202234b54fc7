/**
 * RequestExecutor
 *
 * Sends one prompt through the transport and turns whatever happens into
 * a RequestOutcome. Never throws and never retries: every failure is
 * classified as data so the runner keeps going.
 */

import type { Logger } from 'pino';
import type {
  FailedOutcome,
  PromptRecord,
  RequestError,
  RequestOutcome,
  SuccessfulOutcome,
} from '../types/index.js';
import { estimateTokenCount, type EndpointFormat } from '../transport/endpoint-formats.js';
import type { RequestTransport } from '../transport/types.js';
import { lazyLog } from '../utils/logger-helpers.js';
import { resultify } from '../utils/result-helpers.js';

/**
 * Epoch milliseconds with sub-millisecond precision
 */
export type Clock = () => number;

export const highResolutionClock: Clock = () => performance.timeOrigin + performance.now();

export interface RequestExecutorOptions {
  transport: RequestTransport;
  format: EndpointFormat;
  /** Per-request timeout */
  timeoutMs: number;
  clock?: Clock;
  logger?: Logger;
}

export interface ExecuteOptions {
  /** Caller cancellation (run deadline); yields a `cancelled` outcome */
  signal?: AbortSignal;
  /** Attempt number recorded on the outcome (default: 1) */
  attempt?: number;
}

export class RequestExecutor {
  private readonly transport: RequestTransport;
  private readonly format: EndpointFormat;
  private readonly timeoutMs: number;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(options: RequestExecutorOptions) {
    if (options.timeoutMs <= 0) {
      throw new Error('timeoutMs must be > 0');
    }
    this.transport = options.transport;
    this.format = options.format;
    this.timeoutMs = options.timeoutMs;
    this.clock = options.clock ?? highResolutionClock;
    this.logger = options.logger;
  }

  public async execute(prompt: PromptRecord, options: ExecuteOptions = {}): Promise<RequestOutcome> {
    const attempt = options.attempt ?? 1;
    const parent = options.signal;
    const startedAt = this.clock();

    if (parent?.aborted) {
      return this.fail(prompt, startedAt, attempt, {
        kind: 'cancelled',
        message: 'Request cancelled before dispatch',
      });
    }

    // Own controller per request: the timeout aborts only this call
    const controller = new AbortController();
    const timeoutError = new Error(`Request timed out after ${this.timeoutMs}ms`);
    const timer = setTimeout(() => controller.abort(timeoutError), this.timeoutMs);
    const onParentAbort = (): void => controller.abort(parent?.reason);
    parent?.addEventListener('abort', onParentAbort, { once: true });

    const sent = await resultify(abortable(this.transport.send(prompt, controller.signal), controller.signal));

    clearTimeout(timer);
    parent?.removeEventListener('abort', onParentAbort);

    if (sent.err) {
      if (controller.signal.reason === timeoutError) {
        return this.fail(prompt, startedAt, attempt, {
          kind: 'timeout',
          message: timeoutError.message,
        });
      }
      if (controller.signal.aborted) {
        return this.fail(prompt, startedAt, attempt, {
          kind: 'cancelled',
          message: 'Request cancelled by run deadline',
        });
      }
      return this.fail(prompt, startedAt, attempt, {
        kind: 'transport_error',
        message: describeTransportError(sent.val),
      });
    }

    const response = sent.val;
    if (response.status < 200 || response.status >= 300) {
      return this.fail(prompt, startedAt, attempt, {
        kind: 'endpoint_error',
        message: `HTTP ${response.status}: ${truncate(response.body, 200)}`,
        statusCode: response.status,
      });
    }

    const parsed = this.format.parse(response.body);
    if (parsed.err) {
      return this.fail(prompt, startedAt, attempt, {
        kind: 'parse_error',
        message: parsed.val.message,
        statusCode: response.status,
      });
    }

    const endedAt = this.clock();
    const completion = parsed.val;
    const tokensEstimated =
      completion.completionTokens === undefined || completion.promptTokens === undefined;

    const outcome: SuccessfulOutcome = Object.freeze({
      id: prompt.id,
      success: true,
      startedAt,
      endedAt,
      durationMs: endedAt - startedAt,
      attempts: attempt,
      inputTokens: completion.promptTokens ?? estimateTokenCount(prompt.text),
      outputTokens: completion.completionTokens ?? estimateTokenCount(completion.text),
      statusCode: response.status,
      tokensEstimated,
      error: null,
    });

    lazyLog(
      this.logger,
      'debug',
      () => ({
        id: outcome.id,
        durationMs: outcome.durationMs,
        outputTokens: outcome.outputTokens,
        tokensEstimated,
      }),
      'Request completed'
    );

    return outcome;
  }

  private fail(prompt: PromptRecord, startedAt: number, attempt: number, error: RequestError): FailedOutcome {
    const endedAt = this.clock();
    const outcome: FailedOutcome = Object.freeze({
      id: prompt.id,
      success: false,
      startedAt,
      endedAt,
      durationMs: endedAt - startedAt,
      attempts: attempt,
      inputTokens: 0,
      outputTokens: 0,
      error: Object.freeze(error),
    });

    lazyLog(
      this.logger,
      'debug',
      () => ({ id: outcome.id, kind: error.kind, statusCode: error.statusCode, message: error.message }),
      'Request failed'
    );

    return outcome;
  }
}

/**
 * fetch wraps socket errors as `TypeError: fetch failed` with the real
 * reason in `cause`
 */
function describeTransportError(error: Error): string {
  const cause: unknown = error.cause;
  if (cause instanceof Error) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}

/**
 * Settle with the abort reason as soon as `signal` fires, even when the
 * transport ignores the signal
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      const reason: unknown = signal.reason;
      reject(reason instanceof Error ? reason : new Error('Request aborted'));
    };
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

function truncate(text: string, maxLength: number): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}...` : text;
}
