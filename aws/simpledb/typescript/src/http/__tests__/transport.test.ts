/**
 * Tests for FetchTransport
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { FetchTransport } from '../transport.js';
import { TransportError } from '../../error/index.js';

describe('FetchTransport', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should send the request and lower-case response headers', async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response('<ListDomainsResponse/>', {
          status: 200,
          headers: { 'Content-Type': 'text/xml', 'X-Request-Id': 'abc' },
        })
    );
    vi.stubGlobal('fetch', fetchMock);

    const response = await new FetchTransport().send({
      method: 'POST',
      url: 'https://sdb.example.com/',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8' },
      body: 'Action=ListDomains',
    });

    expect(response.status).toBe(200);
    expect(response.body).toBe('<ListDomainsResponse/>');
    expect(response.headers['x-request-id']).toBe('abc');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://sdb.example.com/',
      expect.objectContaining({ method: 'POST', body: 'Action=ListDomains' })
    );
  });

  it('should resolve for error statuses', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<Response/>', { status: 400 })));

    const response = await new FetchTransport().send({ method: 'POST', url: 'https://sdb.example.com/', headers: {} });

    expect(response.status).toBe(400);
  });

  it('should wrap network failures', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(
      new FetchTransport().send({ method: 'POST', url: 'https://sdb.example.com/', headers: {} })
    ).rejects.toThrow('Network error: fetch failed');
  });

  it('should report timeouts', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => {
              const error = new Error('The operation was aborted');
              error.name = 'AbortError';
              reject(error);
            });
          })
      )
    );

    const error = await new FetchTransport({ timeoutMs: 10 })
      .send({ method: 'POST', url: 'https://sdb.example.com/', headers: {} })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransportError);
    expect(error).toHaveProperty('message', 'Request timeout after 10ms');
  });
});
