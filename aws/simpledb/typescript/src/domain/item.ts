/**
 * Items: named attribute maps within a domain.
 */

import type { AttributeScalar } from '../codec/index.js';

/**
 * One value, or several for a multi-valued attribute.
 */
export type AttributeValue = AttributeScalar | AttributeScalar[];

export type ItemAttributes = Record<string, AttributeValue>;

/**
 * Stores an attribute as an own property, so names like `__proto__` are kept.
 */
export function setAttribute(attributes: ItemAttributes, name: string, value: AttributeValue): void {
  Object.defineProperty(attributes, name, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Where an item writes itself back to.
 */
export interface ItemStore {
  readonly name: string;
  putAttributes(itemName: string, attributes: Readonly<ItemAttributes>): Promise<void>;
  deleteAttributes(itemName: string, attributes?: Readonly<ItemAttributes>): Promise<void>;
}

/**
 * An item and its decoded attributes.
 *
 * Changes made with {@link Item.set} stay local until {@link Item.save}.
 *
 * @example
 * ```typescript
 * const user = await domain.get('user-1');
 * user.set('visits', 3);
 * await user.save();
 * ```
 */
export class Item {
  private readonly values: ItemAttributes;

  constructor(
    readonly domain: ItemStore,
    readonly name: string,
    attributes: Readonly<ItemAttributes> = {}
  ) {
    this.values = { ...attributes };
  }

  get attributes(): Readonly<ItemAttributes> {
    return this.values;
  }

  get size(): number {
    return Object.keys(this.values).length;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  get(attribute: string): AttributeValue | undefined {
    return Object.hasOwn(this.values, attribute) ? this.values[attribute] : undefined;
  }

  set(attribute: string, value: AttributeValue): this {
    setAttribute(this.values, attribute, value);
    return this;
  }

  has(attribute: string): boolean {
    return Object.hasOwn(this.values, attribute);
  }

  keys(): string[] {
    return Object.keys(this.values);
  }

  /**
   * Writes every attribute, replacing stored values.
   */
  async save(): Promise<void> {
    await this.domain.putAttributes(this.name, this.values);
  }

  /**
   * Deletes an attribute's values remotely and locally. Unknown
   * attributes are ignored.
   */
  async deleteAttribute(attribute: string): Promise<void> {
    const value = this.get(attribute);
    if (value === undefined) {
      return;
    }
    await this.domain.deleteAttributes(this.name, { [attribute]: value });
    delete this.values[attribute];
  }

  toJSON(): { name: string; attributes: ItemAttributes } {
    return { name: this.name, attributes: { ...this.values } };
  }
}
