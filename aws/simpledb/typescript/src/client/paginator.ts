/**
 * Continuation-token pagination.
 */

import type { Page, ResponseEnvelope } from '../xml/index.js';

/**
 * Fetches one page. `nextToken` is undefined for the first page.
 */
export type PageFetcher<T> = (nextToken: string | undefined) => Promise<ResponseEnvelope<Page<T>>>;

/**
 * Lazy sequence over every page of a listing or select call.
 *
 * Each iteration starts again from the first page. Pages are requested one
 * at a time, and only as the consumer advances; breaking out of a loop
 * stops further requests.
 *
 * @example
 * ```typescript
 * for await (const item of client.select('users', 'SELECT * FROM `users`')) {
 *   console.log(item.name);
 * }
 * ```
 */
export class Paginator<T> implements AsyncIterable<T> {
  constructor(private readonly fetchPage: PageFetcher<T>) {}

  /**
   * Iterate page envelopes, with request id and box usage.
   */
  async *pages(): AsyncGenerator<ResponseEnvelope<Page<T>>, void, undefined> {
    let nextToken: string | undefined;
    do {
      const page = await this.fetchPage(nextToken);
      yield page;
      nextToken = page.result.nextToken;
    } while (nextToken);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    for await (const page of this.pages()) {
      yield* page.result.items;
    }
  }

  /**
   * Collects every item.
   *
   * @param maxPages - Maximum number of pages to fetch (default: unlimited)
   */
  async toArray(maxPages?: number): Promise<T[]> {
    const items: T[] = [];
    let pageCount = 0;

    for await (const page of this.pages()) {
      items.push(...page.result.items);
      pageCount++;
      if (maxPages !== undefined && pageCount >= maxPages) {
        break;
      }
    }

    return items;
  }
}
