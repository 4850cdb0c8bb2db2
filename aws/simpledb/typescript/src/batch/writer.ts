/**
 * Chunked BatchPutAttributes writes.
 */

import { MAX_BATCH_PUT_ITEMS } from '../config/index.js';
import type { BatchItem, DomainRef, SimpleDbClient } from '../client/index.js';
import { NoopLogger, NoopMetricsCollector, SimpleDbMetricNames } from '../observability/index.js';
import type { Logger, MetricsCollector } from '../observability/index.js';
import { chunk } from './chunker.js';

/**
 * Outcome of a batch write.
 */
export interface BatchWriteResult {
  /** Items written. */
  itemCount: number;
  /** BatchPutAttributes requests issued. */
  requestCount: number;
  /** Total box usage of all requests. */
  boxUsage: number;
}

export interface BatchWriterOptions {
  logger?: Logger;
  metrics?: MetricsCollector;
}

/**
 * Writes any number of items as sequential 25-item BatchPutAttributes calls.
 *
 * Chunks are sent in order. There is no retry: when a chunk fails the call
 * rejects and earlier chunks stay written.
 *
 * @example
 * ```typescript
 * const writer = new BatchWriter(client);
 * const result = await writer.write('users', users.map((u) => ({ name: u.id, attributes: u })));
 * console.log(result.requestCount);
 * ```
 */
export class BatchWriter {
  private readonly logger: Logger;
  private readonly metrics: MetricsCollector;

  constructor(
    private readonly client: SimpleDbClient,
    options: BatchWriterOptions = {}
  ) {
    this.logger = options.logger ?? new NoopLogger();
    this.metrics = options.metrics ?? new NoopMetricsCollector();
  }

  async write(domain: DomainRef, items: readonly BatchItem[]): Promise<BatchWriteResult> {
    const chunks = chunk(items, MAX_BATCH_PUT_ITEMS);
    const result: BatchWriteResult = { itemCount: 0, requestCount: 0, boxUsage: 0 };

    for (const [index, batch] of chunks.entries()) {
      const metadata = await this.client.batchPutAttributes(domain, batch);
      result.itemCount += batch.length;
      result.requestCount++;
      result.boxUsage += metadata.boxUsage;
      this.metrics.incrementCounter(SimpleDbMetricNames.BATCH_CHUNKS, 1);
      this.logger.debug('Batch chunk written', {
        chunk: index + 1,
        chunks: chunks.length,
        items: batch.length,
        requestId: metadata.requestId,
      });
    }

    return result;
  }
}
