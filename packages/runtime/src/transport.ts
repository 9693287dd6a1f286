/**
 * Transport
 *
 * Carries a request message to an endpoint and hands back the raw outcome.
 * Interpreting the outcome is the exchange's job.
 */

import {
  JSON_CONTENT_TYPE,
  statusOutcomeOf,
  stringifyWire,
  type StatusOutcome,
  type WireRequest,
} from '@carp/protocol';

export interface TransportResponse {
  outcome: StatusOutcome;
  /** Raw status code, kept for error messages */
  status: number;
  contentType: string | null;
  body: string;
}

export interface TransportClient {
  /**
   * Send a request. Rejects on I/O failure; any status resolves.
   */
  post(endpoint: URL, request: WireRequest): Promise<TransportResponse>;
}

export type FetchFunction = typeof fetch;

export interface HttpTransportOptions {
  /** Abort requests after this many milliseconds; 0 disables */
  request_timeout_ms?: number;
  user_agent?: string;
  /** Defaults to the global fetch */
  fetch?: FetchFunction;
}

/**
 * JSON over HTTP POST.
 */
export class HttpTransportClient implements TransportClient {
  private readonly timeoutMs: number;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFunction;

  constructor(options: HttpTransportOptions = {}) {
    this.timeoutMs = options.request_timeout_ms ?? 30000;
    this.userAgent = options.user_agent ?? 'carp-client/0.1.0';
    this.fetchFn = options.fetch ?? fetch;
  }

  async post(endpoint: URL, request: WireRequest): Promise<TransportResponse> {
    const response = await this.fetchFn(endpoint, {
      method: 'POST',
      headers: {
        'Content-Type': JSON_CONTENT_TYPE,
        'Accept': JSON_CONTENT_TYPE,
        'User-Agent': this.userAgent,
      },
      body: stringifyWire(request),
      signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined,
    });

    return {
      outcome: statusOutcomeOf(response.status),
      status: response.status,
      contentType: response.headers.get('content-type'),
      body: await response.text(),
    };
  }
}
