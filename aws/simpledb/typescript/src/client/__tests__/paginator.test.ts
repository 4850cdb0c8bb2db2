/**
 * Tests for Paginator
 */

import { describe, it, expect, vi } from 'vitest';
import { Paginator } from '../paginator.js';
import type { Page, ResponseEnvelope } from '../../xml/index.js';

function envelope(items: number[], nextToken?: string): ResponseEnvelope<Page<number>> {
  return { requestId: 'req', boxUsage: 0.1, result: { items, nextToken } };
}

function createFetcher() {
  return vi.fn(async (token: string | undefined) => {
    switch (token) {
      case undefined:
        return envelope([1, 2], 'p2');
      case 'p2':
        return envelope([3], 'p3');
      default:
        return envelope([4]);
    }
  });
}

describe('Paginator', () => {
  it('should yield items of every page in order', async () => {
    const fetcher = createFetcher();

    expect(await new Paginator(fetcher).toArray()).toEqual([1, 2, 3, 4]);
    expect(fetcher.mock.calls.map(([token]) => token)).toEqual([undefined, 'p2', 'p3']);
  });

  it('should stop after maxPages', async () => {
    const fetcher = createFetcher();

    expect(await new Paginator(fetcher).toArray(2)).toEqual([1, 2, 3]);
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should expose page envelopes', async () => {
    const boxUsage: number[] = [];
    for await (const page of new Paginator(createFetcher()).pages()) {
      boxUsage.push(page.boxUsage);
    }

    expect(boxUsage).toEqual([0.1, 0.1, 0.1]);
  });

  it('should fetch lazily', async () => {
    const fetcher = createFetcher();
    const iterator = new Paginator(fetcher)[Symbol.asyncIterator]();

    expect(fetcher).not.toHaveBeenCalled();
    expect((await iterator.next()).value).toBe(1);
    expect((await iterator.next()).value).toBe(2);
    expect(fetcher).toHaveBeenCalledTimes(1);
  });
});
