/**
 * HTTP Transport
 *
 * POSTs completion requests with the global fetch. Status codes are
 * returned as-is; only connection failures and aborts reject.
 */

import type { Logger } from 'pino';
import type { PromptRecord } from '../types/index.js';
import type { EndpointFormat } from './endpoint-formats.js';
import type { RequestTransport, TransportResponse, TransportSettings } from './types.js';

export interface HttpTransportOptions {
  settings: TransportSettings;
  format: EndpointFormat;
  /** Extra headers merged over the defaults */
  headers?: Record<string, string>;
  logger?: Logger;
}

export class HttpTransport implements RequestTransport {
  private readonly settings: TransportSettings;
  private readonly format: EndpointFormat;
  private readonly headers: Record<string, string>;
  private readonly logger?: Logger;

  constructor(options: HttpTransportOptions) {
    this.settings = options.settings;
    this.format = options.format;
    this.logger = options.logger;

    this.headers = {
      'Content-Type': 'application/json',
      ...(options.settings.authToken ? { Authorization: `Bearer ${options.settings.authToken}` } : {}),
      ...options.headers,
    };
  }

  public async send(prompt: PromptRecord, signal: AbortSignal): Promise<TransportResponse> {
    const response = await fetch(this.settings.url, {
      method: 'POST',
      headers: this.headers,
      body: JSON.stringify(this.format.buildBody(prompt.text, this.settings)),
      signal,
    });

    // Body read shares the signal, so a stalled stream still honors the timeout
    const body = await response.text();
    return { status: response.status, body };
  }

  /**
   * Reachability check: any HTTP response counts, even 4xx/5xx
   */
  public async ping(signal: AbortSignal): Promise<void> {
    const response = await fetch(this.settings.url, {
      method: 'HEAD',
      headers: this.headers,
      signal,
    });

    this.logger?.debug(
      { url: this.settings.url, status: response.status },
      'Endpoint ping answered'
    );
  }
}
