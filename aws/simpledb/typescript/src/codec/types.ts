/**
 * Attribute codec types.
 *
 * SimpleDB stores every attribute value as a string and compares them
 * lexicographically, so typed values are encoded into strings whose order
 * matches the order of the values.
 */

import type { NumberCodec } from './number.js';
import type { BooleanCodec } from './boolean.js';
import type { TimestampCodec } from './timestamp.js';
import type { OpaqueCodec } from './opaque.js';

/**
 * A typed value that can be stored in, or compared against, an attribute.
 */
export type AttributeScalar = string | number | boolean | Date;

/**
 * Codec discriminator.
 */
export type CodecKind = 'number' | 'boolean' | 'timestamp' | 'opaque';

/**
 * Encode/decode pair for one attribute.
 */
export type AttributeCodec = NumberCodec | BooleanCodec | TimestampCodec | OpaqueCodec;

/**
 * Attribute name to codec lookup. Attributes without an entry pass through.
 */
export type CodecTable = Readonly<Record<string, AttributeCodec>>;
