/**
 * Client request and result types.
 */

import type { AttributeEncoder } from '../codec/index.js';
import type { AttributeValue, ItemAttributes } from '../domain/item.js';
import type { HttpTransport } from '../http/index.js';
import type { Logger } from '../observability/index.js';
import type { MetricsCollector } from '../observability/index.js';

/**
 * One attribute write with an explicit replace flag.
 */
export interface AttributeUpdate {
  name: string;
  value: AttributeValue;
  /** Overwrite existing values instead of adding to them. Defaults to true. */
  replace?: boolean;
}

/**
 * Attributes to write: a record (every attribute replaced) or an ordered
 * list of updates.
 */
export type AttributeInput = Readonly<ItemAttributes> | readonly AttributeUpdate[];

/**
 * One item of a batch write. An {@link Item} fits this shape.
 */
export interface BatchItem {
  name: string;
  attributes: AttributeInput;
}

/**
 * Domain statistics.
 */
export interface DomainMetadata {
  itemCount: number;
  itemNamesSizeBytes: number;
  attributeNameCount: number;
  attributeNamesSizeBytes: number;
  attributeValueCount: number;
  attributeValuesSizeBytes: number;
  /** When the statistics were computed. */
  timestamp: Date;
}

/**
 * Collaborators of the client. Everything has a default.
 */
export interface SimpleDbClientOptions {
  /** HTTP transport (default: fetch with the configured timeout). */
  transport?: HttpTransport;
  /** Attribute encoding (default: pass-through). */
  encoder?: AttributeEncoder;
  /** Logger (default: console at the configured level). */
  logger?: Logger;
  /** Metrics (default: no-op). */
  metrics?: MetricsCollector;
  /** Clock used for request timestamps. */
  clock?: () => Date;
}
