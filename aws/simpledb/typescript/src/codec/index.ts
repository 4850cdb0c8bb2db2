/**
 * Attribute Codecs
 */

export type { AttributeScalar, AttributeCodec, CodecKind, CodecTable } from './types.js';
export { NumberCodec } from './number.js';
export type { NumberCodecOptions } from './number.js';
export { BooleanCodec } from './boolean.js';
export { TimestampCodec, DEFAULT_TIMESTAMP_FORMAT } from './timestamp.js';
export { OpaqueCodec } from './opaque.js';
export {
  scalarToString,
  encodeWithCodec,
  decodeWithCodec,
  PassThroughEncoder,
  CodecTableEncoder,
} from './encoder.js';
export type { AttributeEncoder } from './encoder.js';
