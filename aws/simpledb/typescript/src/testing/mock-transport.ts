/**
 * Mock Transport for Testing
 *
 * Replays queued responses and records every request with its decoded
 * form parameters. Nothing leaves the process.
 */

import { TransportError } from '../error/index.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../http/index.js';

/**
 * A sent request with its form body decoded.
 */
export interface RecordedRequest extends HttpRequest {
  params: Record<string, string>;
}

/**
 * Computes a response from the request.
 */
export type MockResponder = (request: RecordedRequest) => HttpResponse;

type Queued = HttpResponse | Error | MockResponder;

/**
 * @example
 * ```typescript
 * const transport = new MockTransport().enqueue(listDomainsResponse(['users']));
 * const client = new SimpleDbClient(config, { transport });
 * await client.listDomains().toArray(); // ['users']
 * transport.actions; // ['ListDomains']
 * ```
 */
export class MockTransport implements HttpTransport {
  readonly requests: RecordedRequest[] = [];
  private readonly queue: Queued[] = [];

  /**
   * Queues responses in order. An Error is thrown by `send` instead.
   */
  enqueue(...responses: Queued[]): this {
    this.queue.push(...responses);
    return this;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const recorded: RecordedRequest = {
      ...request,
      params: Object.fromEntries(new URLSearchParams(request.body ?? '')),
    };
    this.requests.push(recorded);

    const next = this.queue.shift();
    if (next === undefined) {
      throw new TransportError(`No mock response queued for ${recorded.params.Action ?? 'request'}`);
    }
    if (next instanceof Error) {
      throw next;
    }
    return typeof next === 'function' ? next(recorded) : next;
  }

  /**
   * Action of every recorded request, in order.
   */
  get actions(): string[] {
    return this.requests.map((r) => r.params.Action ?? '');
  }

  /**
   * Form parameters of a recorded request; the last one by default.
   */
  params(index = this.requests.length - 1): Record<string, string> {
    const request = this.requests[index];
    if (!request) {
      throw new Error(`No request recorded at index ${index}`);
    }
    return request.params;
  }

  /**
   * Responses not consumed yet.
   */
  get pending(): number {
    return this.queue.length;
  }

  reset(): void {
    this.requests.length = 0;
    this.queue.length = 0;
  }
}
