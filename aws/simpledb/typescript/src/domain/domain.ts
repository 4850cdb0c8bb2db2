/**
 * Domains: the query root and a best-effort item cache.
 */

import { NotFoundError } from '../error/index.js';
import type { AttributeScalar } from '../codec/index.js';
import { Query } from '../query/index.js';
import type { ItemNameQuery, PredicateArgument, QuerySource } from '../query/index.js';
import type { SimpleDbClient } from '../client/index.js';
import type { DomainMetadata } from '../client/types.js';
import { Item } from './item.js';
import type { ItemAttributes, ItemStore } from './item.js';

/**
 * A named domain bound to a client.
 *
 * Items fetched with {@link Domain.get} are cached on the instance. The
 * cache is never invalidated by other writers; call
 * {@link Domain.clearCache} to drop it.
 *
 * @example
 * ```typescript
 * const users = client.domain('users');
 * await users.set('user-1', { name: 'Ada', age: 36 });
 * const names = await users.filter({ age__gte: 18 }).itemNames().fetch();
 * ```
 */
export class Domain implements QuerySource, ItemStore, AsyncIterable<Item> {
  private readonly items = new Map<string, Item>();

  constructor(
    readonly name: string,
    readonly client: SimpleDbClient
  ) {}

  encodeValue(attribute: string, value: AttributeScalar): string {
    return this.client.encoder.encode(this.name, attribute, value);
  }

  /**
   * Runs a raw select expression and collects every page.
   */
  async select(expression: string): Promise<Item[]> {
    return this.client.select(this, expression).toArray();
  }

  /**
   * Loads an item, from the cache when present.
   *
   * @throws {NotFoundError} If the item has no attributes
   */
  async get(itemName: string): Promise<Item> {
    const item = await this.load(itemName);
    if (!item) {
      throw new NotFoundError(itemName, this.name);
    }
    return item;
  }

  /**
   * Loads an item, or returns an empty unsaved one.
   */
  async getOrEmpty(itemName: string): Promise<Item> {
    return (await this.load(itemName)) ?? new Item(this, itemName);
  }

  private async load(itemName: string): Promise<Item | undefined> {
    const cached = this.items.get(itemName);
    if (cached) {
      return cached;
    }
    const attributes = await this.client.getAttributes(this, itemName);
    if (Object.keys(attributes).length === 0) {
      return undefined;
    }
    const item = new Item(this, itemName, attributes);
    this.items.set(itemName, item);
    return item;
  }

  /**
   * Replaces an item: deletes every stored attribute, then writes the new ones.
   */
  async set(itemName: string, attributes: Readonly<ItemAttributes>): Promise<Item> {
    await this.delete(itemName);
    const item = new Item(this, itemName, attributes);
    await item.save();
    return item;
  }

  /**
   * Deletes an item and drops it from the cache.
   */
  async delete(itemName: string): Promise<void> {
    await this.client.deleteAttributes(this, itemName);
    this.items.delete(itemName);
  }

  async putAttributes(itemName: string, attributes: Readonly<ItemAttributes>): Promise<void> {
    await this.client.putAttributes(this, itemName, attributes);
  }

  async deleteAttributes(itemName: string, attributes?: Readonly<ItemAttributes>): Promise<void> {
    await this.client.deleteAttributes(this, itemName, attributes);
  }

  metadata(): Promise<DomainMetadata> {
    return this.client.domainMetadata(this);
  }

  clearCache(): void {
    this.items.clear();
  }

  all(): Query {
    return new Query(this);
  }

  filter(...args: PredicateArgument[]): Query {
    return this.all().filter(...args);
  }

  values(...fields: string[]): Query {
    return this.all().values(...fields);
  }

  itemNames(): ItemNameQuery {
    return this.all().itemNames();
  }

  count(): Promise<number> {
    return this.all().count();
  }

  [Symbol.asyncIterator](): AsyncIterator<Item> {
    return this.all()[Symbol.asyncIterator]();
  }

  toString(): string {
    return this.name;
  }
}
