/**
 * Attribute-level encoding through codec tables.
 */

import { ValidationError } from '../error/index.js';
import type { AttributeCodec, AttributeScalar, CodecTable } from './types.js';

/**
 * Converts a value to its stored string form without a codec.
 */
export function scalarToString(value: AttributeScalar): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

/**
 * Encodes a value with an optional codec.
 *
 * Strings are taken as already encoded whatever the codec. Any other value
 * must match the codec's type.
 *
 * @throws {ValidationError} If the value does not fit the codec
 */
export function encodeWithCodec(codec: AttributeCodec | undefined, value: AttributeScalar): string {
  if (!codec || typeof value === 'string') {
    return scalarToString(value);
  }

  switch (codec.kind) {
    case 'number':
      if (typeof value === 'number') return codec.encode(value);
      break;
    case 'boolean':
      if (typeof value === 'boolean') return codec.encode(value);
      break;
    case 'timestamp':
      if (value instanceof Date) return codec.encode(value);
      break;
    case 'opaque':
      return scalarToString(value);
  }

  throw new ValidationError(`Value ${scalarToString(value)} cannot be encoded by a ${codec.kind} codec`, {
    kind: codec.kind,
  });
}

/**
 * Decodes a stored string with an optional codec.
 *
 * @throws {DecodeError} If the string is malformed for the codec
 */
export function decodeWithCodec(codec: AttributeCodec | undefined, raw: string): AttributeScalar {
  return codec ? codec.decode(raw) : raw;
}

/**
 * Per-domain attribute encoding hook used by query compilation.
 */
export interface AttributeEncoder {
  encode(domain: string, attribute: string, value: AttributeScalar): string;
  decode(domain: string, attribute: string, raw: string): AttributeScalar;
}

/**
 * Encoder for domains without declared codecs.
 */
export class PassThroughEncoder implements AttributeEncoder {
  encode(_domain: string, _attribute: string, value: AttributeScalar): string {
    return scalarToString(value);
  }

  decode(_domain: string, _attribute: string, raw: string): AttributeScalar {
    return raw;
  }
}

/**
 * Encoder backed by a codec table per domain name.
 *
 * @example
 * ```typescript
 * const encoder = new CodecTableEncoder({
 *   users: { age: new NumberCodec({ padding: 3 }), active: new BooleanCodec() },
 * });
 * encoder.encode('users', 'age', 25); // '025'
 * ```
 */
export class CodecTableEncoder implements AttributeEncoder {
  constructor(private readonly tables: Readonly<Record<string, CodecTable>>) {}

  /**
   * Codec declared for an attribute, if any.
   */
  codecFor(domain: string, attribute: string): AttributeCodec | undefined {
    const table = Object.hasOwn(this.tables, domain) ? this.tables[domain] : undefined;
    if (!table || !Object.hasOwn(table, attribute)) {
      return undefined;
    }
    return table[attribute];
  }

  encode(domain: string, attribute: string, value: AttributeScalar): string {
    return encodeWithCodec(this.codecFor(domain, attribute), value);
  }

  decode(domain: string, attribute: string, raw: string): AttributeScalar {
    return decodeWithCodec(this.codecFor(domain, attribute), raw);
  }
}
