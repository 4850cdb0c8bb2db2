/**
 * Tests for BatchWriter
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { BatchWriter } from '../writer.js';
import { SimpleDbClient } from '../../client/index.js';
import type { BatchItem } from '../../client/index.js';
import { SimpleDbConfigBuilder } from '../../config/index.js';
import { RemoteServiceError } from '../../error/index.js';
import { InMemoryMetricsCollector, NoopLogger, SimpleDbMetricNames } from '../../observability/index.js';
import { MockTransport, actionResponse, errorResponse } from '../../testing/index.js';

const config = new SimpleDbConfigBuilder().credentials('test-access-key', 'test-secret').build();

function items(count: number): BatchItem[] {
  return Array.from({ length: count }, (_, i) => ({ name: `item-${i}`, attributes: { position: String(i) } }));
}

function itemNamesOf(params: Record<string, string>): string[] {
  const names: string[] = [];
  for (let i = 0; params[`Item.${i}.ItemName`] !== undefined; i++) {
    names.push(params[`Item.${i}.ItemName`] ?? '');
  }
  return names;
}

describe('BatchWriter', () => {
  let transport: MockTransport;
  let client: SimpleDbClient;

  beforeEach(() => {
    transport = new MockTransport();
    client = new SimpleDbClient(config, { transport, logger: new NoopLogger() });
  });

  it('should split 60 items into chunks of 25, 25 and 10 in order', async () => {
    const ok = () => actionResponse('BatchPutAttributes');
    transport.enqueue(ok, ok, ok);
    const metrics = new InMemoryMetricsCollector();

    const result = await new BatchWriter(client, { metrics }).write('users', items(60));

    expect(transport.actions).toEqual(['BatchPutAttributes', 'BatchPutAttributes', 'BatchPutAttributes']);
    const chunks = transport.requests.map((r) => itemNamesOf(r.params));
    expect(chunks.map((c) => c.length)).toEqual([25, 25, 10]);
    expect(chunks.flat()).toEqual(items(60).map((i) => i.name));
    expect(result.itemCount).toBe(60);
    expect(result.requestCount).toBe(3);
    expect(result.boxUsage).toBeCloseTo(3 * 0.0000219907, 12);
    expect(metrics.getCounter(SimpleDbMetricNames.BATCH_CHUNKS)).toBe(3);
  });

  it('should send nothing for an empty list', async () => {
    const result = await new BatchWriter(client).write('users', []);

    expect(result).toEqual({ itemCount: 0, requestCount: 0, boxUsage: 0 });
    expect(transport.requests).toHaveLength(0);
  });

  it('should stop at the first failing chunk', async () => {
    transport.enqueue(
      actionResponse('BatchPutAttributes'),
      errorResponse(400, 'NumberSubmittedItemsExceeded', 'Too many items in a single call.'),
      actionResponse('BatchPutAttributes')
    );

    await expect(new BatchWriter(client).write('users', items(60))).rejects.toThrow(RemoteServiceError);
    expect(transport.requests).toHaveLength(2);
    expect(transport.pending).toBe(1);
  });
});
