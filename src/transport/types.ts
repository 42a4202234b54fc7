/**
 * Request Transport Types
 *
 * The executor talks to the endpoint only through RequestTransport, so
 * HTTP can be swapped for an in-process mock or another protocol.
 */

import type { PromptRecord } from '../types/index.js';

/**
 * Raw response handed back to the executor. Parsing happens in the
 * executor so malformed bodies are classified the same way for every
 * transport.
 */
export interface TransportResponse {
  status: number;
  body: string;
}

/**
 * Pluggable request transport
 *
 * Contract:
 * - `send` issues exactly one request and rejects on connection-level
 *   failure; any HTTP status resolves.
 * - `send` must stop work and reject when `signal` aborts.
 * - `ping`, when present, resolves if the endpoint is reachable at all
 *   (any status) and rejects otherwise.
 */
export interface RequestTransport {
  send(prompt: PromptRecord, signal: AbortSignal): Promise<TransportResponse>;
  ping?(signal: AbortSignal): Promise<void>;
}

/**
 * Endpoint parameters passed through to the request body
 */
export interface TransportSettings {
  url: string;
  /** Sent as a Bearer token when non-empty */
  authToken: string;
  model: string;
  maxTokens: number;
  temperature: number;
}
