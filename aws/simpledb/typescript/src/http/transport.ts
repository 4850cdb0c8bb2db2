/**
 * Transport layer abstraction for HTTP communication.
 *
 * @module http/transport
 */

import { TransportError } from '../error/index.js';
import { DEFAULT_TIMEOUT_MS } from '../config/defaults.js';
import type { HttpRequest, HttpResponse, HttpTransportConfig } from './types.js';

/**
 * Sends one HTTP request and returns the raw response.
 *
 * Implementations resolve for every HTTP status and reject only when no
 * response was received.
 *
 * @example
 * ```typescript
 * class StubTransport implements HttpTransport {
 *   async send(request: HttpRequest): Promise<HttpResponse> {
 *     return { status: 200, headers: {}, body: '<ListDomainsResponse/>' };
 *   }
 * }
 * ```
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Fetch-based HTTP transport with a per-request timeout.
 */
export class FetchTransport implements HttpTransport {
  private readonly timeoutMs: number;

  constructor(config?: HttpTransportConfig) {
    this.timeoutMs = config?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /**
   * @throws {TransportError} On network failure or timeout
   */
  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body: request.body,
        signal: controller.signal,
      });

      const body = await response.text();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        headers,
        body,
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timeout after ${this.timeoutMs}ms`, error);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransportError(`Network error: ${message}`, error);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
