/**
 * Query Compiler
 *
 * Immutable select queries over one domain. Every builder call returns a
 * new query; results are fetched lazily, once per query value.
 */

import { NotFoundError, ProtocolError, ValidationError } from '../error/index.js';
import { scalarToString } from '../codec/index.js';
import type { AttributeScalar } from '../codec/index.js';
import type { Item } from '../domain/item.js';
import { quoteAttribute, quoteDomain } from './operators.js';
import { PredicateGroup, itemName, renderPredicate, where } from './predicate.js';
import type { PredicateArgument } from './predicate.js';

/**
 * What a query needs from its domain.
 */
export interface QuerySource {
  readonly name: string;
  /** Encodes a comparison value with the attribute's codec. */
  encodeValue(attribute: string, value: AttributeScalar): string;
  /** Runs a select expression, following every continuation token. */
  select(expression: string): Promise<Item[]>;
}

export type SortDirection = 'ASC' | 'DESC';

export interface OrderBy {
  field: string;
  direction: SortDirection;
}

/**
 * Query parameters shared by every query variant.
 */
export interface QueryState {
  readonly predicate: PredicateGroup;
  readonly fields: readonly string[];
  readonly order?: OrderBy;
  readonly limit?: number;
}

const EMPTY_STATE: QueryState = {
  predicate: new PredicateGroup('AND'),
  fields: [],
};

/**
 * Shared builder and evaluation logic.
 *
 * @typeParam R - Result row type
 * @typeParam Q - Concrete query type returned by builder calls
 */
export abstract class BaseQuery<R, Q extends BaseQuery<R, Q>> implements AsyncIterable<R> {
  private pending?: Promise<readonly R[]>;
  private results?: readonly R[];
  private pendingCount?: Promise<number>;

  protected constructor(
    readonly source: QuerySource,
    protected readonly state: QueryState
  ) {}

  protected abstract create(state: QueryState): Q;

  /** Columns in the SELECT clause. */
  protected abstract projection(): readonly string[];

  /** Maps fetched items to result rows. */
  protected abstract project(items: readonly Item[]): R[];

  /**
   * Adds conditions, ANDed with the existing ones.
   *
   * @example
   * ```typescript
   * query.filter({ age__gt: 21 }).filter(where({ a: 1 }).or(where({ b: 2 })));
   * ```
   */
  filter(...args: PredicateArgument[]): Q {
    return this.create({ ...this.state, predicate: this.state.predicate.and(where(...args)) });
  }

  /**
   * Restricts the returned attributes.
   */
  values(...fields: string[]): Q {
    return this.create({ ...this.state, fields });
  }

  /**
   * Sorts by a field; a leading `-` sorts descending.
   */
  orderBy(field: string): Q {
    const descending = field.startsWith('-');
    const name = descending ? field.slice(1) : field;
    if (!name) {
      throw new ValidationError('orderBy requires a field name');
    }
    return this.create({ ...this.state, order: { field: name, direction: descending ? 'DESC' : 'ASC' } });
  }

  /**
   * Caps the number of results.
   *
   * @throws {ValidationError} If `n` is not a positive integer
   */
  limit(n: number): Q {
    if (!Number.isInteger(n) || n < 1) {
      throw new ValidationError(`Limit must be a positive integer, got ${n}`);
    }
    return this.create({ ...this.state, limit: n });
  }

  /**
   * Same query, unevaluated.
   */
  all(): Q {
    return this.create(this.state);
  }

  /**
   * Same query returning item names only.
   */
  itemNames(): ItemNameQuery {
    return new ItemNameQuery(this.source, this.state);
  }

  /**
   * Compiles the select expression.
   */
  compile(): string {
    return this.compileWith(this.projection());
  }

  private compileWith(projection: readonly string[]): string {
    const parts = [
      'SELECT',
      projection.length > 0 ? projection.map(quoteAttribute).join(', ') : '*',
      'FROM',
      quoteDomain(this.source.name),
    ];

    const condition = renderPredicate(this.state.predicate, (attribute, value) =>
      this.source.encodeValue(attribute, value)
    );
    if (condition) {
      parts.push('WHERE', condition);
    }
    if (this.state.order) {
      parts.push('ORDER BY', quoteAttribute(this.state.order.field), this.state.order.direction);
    }
    if (this.state.limit !== undefined) {
      parts.push(`LIMIT ${this.state.limit}`);
    }
    return parts.join(' ');
  }

  /**
   * Fetches all results. Concurrent callers share one request; a failure
   * is not cached.
   */
  fetch(): Promise<readonly R[]> {
    if (this.results) {
      return Promise.resolve(this.results);
    }
    if (!this.pending) {
      this.pending = this.source.select(this.compile()).then(
        (items) => {
          const rows = this.project(items);
          this.results = rows;
          return rows;
        },
        (error: unknown) => {
          this.pending = undefined;
          throw error;
        }
      );
    }
    return this.pending;
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<R, void, undefined> {
    yield* await this.fetch();
  }

  /**
   * Result at a position. An unevaluated query fetches only `index + 1` rows.
   */
  async at(index: number): Promise<R | undefined> {
    if (!Number.isInteger(index) || index < 0) {
      throw new ValidationError(`Index must be a non-negative integer, got ${index}`);
    }
    if (this.results) {
      return this.results[index];
    }
    const limit = this.state.limit === undefined ? index + 1 : Math.min(this.state.limit, index + 1);
    const rows = await this.create({ ...this.state, limit }).fetch();
    return rows[index];
  }

  /**
   * Number of fetched results.
   */
  async length(): Promise<number> {
    return (await this.fetch()).length;
  }

  /**
   * Counts matching items server-side, or uses the cached results. The
   * count request is made at most once per query.
   *
   * @throws {ProtocolError} If the response has no `Count` attribute
   */
  count(): Promise<number> {
    if (this.results) {
      return Promise.resolve(this.results.length);
    }
    if (!this.pendingCount) {
      this.pendingCount = this.fetchCount().catch((error: unknown) => {
        this.pendingCount = undefined;
        throw error;
      });
    }
    return this.pendingCount;
  }

  private async fetchCount(): Promise<number> {
    const rows = await this.source.select(this.compileWith(['count(*)']));
    if (rows.length === 0) {
      throw new ProtocolError('Count response is missing the Count attribute', {
        details: { domain: this.source.name },
      });
    }
    // A slow count comes back as several pages, one partial count per row.
    return rows.reduce((total, row) => total + this.readCount(row), 0);
  }

  private readCount(row: Item): number {
    const raw = row.get('Count');
    if (raw === undefined || Array.isArray(raw)) {
      throw new ProtocolError('Count response is missing the Count attribute', {
        details: { domain: this.source.name },
      });
    }
    const count = Number.parseInt(scalarToString(raw), 10);
    if (Number.isNaN(count)) {
      throw new ProtocolError(`Count attribute '${scalarToString(raw)}' is not a number`, {
        details: { domain: this.source.name },
      });
    }
    return count;
  }

  /**
   * The result for an item name.
   *
   * @throws {NotFoundError} If no item matches
   */
  async get(name: string): Promise<R> {
    const [first] = await this.filter(itemName(name)).fetch();
    if (first === undefined) {
      throw new NotFoundError(name, this.source.name);
    }
    return first;
  }

  /**
   * Whether an item with this name matches the query.
   */
  async exists(name: string): Promise<boolean> {
    const names = await this.filter(itemName(name)).itemNames().limit(1).fetch();
    return names.length > 0;
  }
}

/**
 * Query returning items.
 *
 * @example
 * ```typescript
 * const adults = await domain
 *   .filter({ age__gte: 18 })
 *   .values('name', 'age')
 *   .orderBy('-age')
 *   .limit(10)
 *   .fetch();
 * ```
 */
export class Query extends BaseQuery<Item, Query> {
  constructor(source: QuerySource, state: QueryState = EMPTY_STATE) {
    super(source, state);
  }

  protected override create(state: QueryState): Query {
    return new Query(this.source, state);
  }

  protected override projection(): readonly string[] {
    return this.state.fields;
  }

  protected override project(items: readonly Item[]): Item[] {
    return [...items];
  }
}

/**
 * Query returning item names. The projection is always `itemName()`.
 */
export class ItemNameQuery extends BaseQuery<string, ItemNameQuery> {
  constructor(source: QuerySource, state: QueryState = EMPTY_STATE) {
    super(source, state);
  }

  protected override create(state: QueryState): ItemNameQuery {
    return new ItemNameQuery(this.source, state);
  }

  protected override projection(): readonly string[] {
    return ['itemName()'];
  }

  protected override project(items: readonly Item[]): string[] {
    return items.map((item) => item.name);
  }

  /**
   * @throws {ValidationError} Always; the projection is fixed
   */
  override values(..._fields: string[]): never {
    throw new ValidationError('Item name queries cannot select attributes');
  }
}
