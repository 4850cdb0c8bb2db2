/**
 * Tests for codec tables and attribute encoders
 */

import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../error/index.js';
import { BooleanCodec } from '../boolean.js';
import { NumberCodec } from '../number.js';
import { TimestampCodec } from '../timestamp.js';
import { CodecTableEncoder, PassThroughEncoder, decodeWithCodec, encodeWithCodec, scalarToString } from '../encoder.js';

describe('scalarToString', () => {
  it('should stringify every scalar type', () => {
    expect(scalarToString('x')).toBe('x');
    expect(scalarToString(42)).toBe('42');
    expect(scalarToString(false)).toBe('false');
    expect(scalarToString(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toBe('2024-01-02T03:04:05.000Z');
  });
});

describe('encodeWithCodec', () => {
  it('should use the codec for matching types', () => {
    expect(encodeWithCodec(new NumberCodec({ padding: 3 }), 7)).toBe('007');
    expect(encodeWithCodec(new BooleanCodec(), true)).toBe('1');
    expect(encodeWithCodec(new TimestampCodec(), new Date(Date.UTC(2024, 0, 2)))).toBe('2024-01-02T00:00:00');
  });

  it('should treat strings as already encoded', () => {
    expect(encodeWithCodec(new NumberCodec({ padding: 3 }), '007')).toBe('007');
  });

  it('should reject mismatched types', () => {
    expect(() => encodeWithCodec(new BooleanCodec(), 5)).toThrow(ValidationError);
    expect(() => encodeWithCodec(new NumberCodec(), new Date())).toThrow(ValidationError);
  });

  it('should stringify without a codec', () => {
    expect(encodeWithCodec(undefined, 5)).toBe('5');
  });
});

describe('decodeWithCodec', () => {
  it('should return raw strings without a codec', () => {
    expect(decodeWithCodec(undefined, '007')).toBe('007');
    expect(decodeWithCodec(new NumberCodec({ padding: 3 }), '007')).toBe(7);
  });
});

describe('PassThroughEncoder', () => {
  it('should not transform values', () => {
    const encoder = new PassThroughEncoder();
    expect(encoder.encode('users', 'age', 25)).toBe('25');
    expect(encoder.decode('users', 'age', '25')).toBe('25');
  });
});

describe('CodecTableEncoder', () => {
  const encoder = new CodecTableEncoder({
    users: { age: new NumberCodec({ padding: 3 }), active: new BooleanCodec() },
  });

  it('should encode through the domain table', () => {
    expect(encoder.encode('users', 'age', 25)).toBe('025');
    expect(encoder.encode('users', 'active', false)).toBe('0');
  });

  it('should decode through the domain table', () => {
    expect(encoder.decode('users', 'age', '025')).toBe(25);
    expect(encoder.decode('users', 'active', '1')).toBe(true);
  });

  it('should pass through unknown attributes and domains', () => {
    expect(encoder.encode('users', 'name', 'Ada')).toBe('Ada');
    expect(encoder.encode('orders', 'age', 25)).toBe('25');
    expect(encoder.decode('users', 'toString', 'x')).toBe('x');
    expect(encoder.codecFor('users', 'constructor')).toBeUndefined();
  });
});
