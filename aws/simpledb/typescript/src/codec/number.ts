/**
 * Sort-preserving number codec.
 */

import { DecodeError, ValidationError } from '../error/index.js';

export interface NumberCodecOptions {
  /** Digits before the decimal point, zero-padded. */
  padding?: number;
  /** Added before encoding so negative values sort correctly. */
  offset?: number;
  /** Fractional digits kept. */
  precision?: number;
}

const DECIMAL_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Encodes numbers as fixed-width, zero-padded decimal strings.
 *
 * The value is shifted by `offset` first. With `padding = 6` and
 * `offset = 10000`, `-42` becomes `'009958'` and `25` becomes `'010025'`.
 * Choosing the range is the caller's job: values outside it are still
 * encoded, they just stop sorting correctly.
 *
 * @example
 * ```typescript
 * const price = new NumberCodec({ padding: 5, offset: 0, precision: 2 });
 * price.encode(3.5); // '00003.50'
 * price.decode('00003.50'); // 3.5
 * ```
 */
export class NumberCodec {
  readonly kind = 'number' as const;
  readonly padding: number;
  readonly offset: number;
  readonly precision: number;

  constructor(options: NumberCodecOptions = {}) {
    this.padding = options.padding ?? 0;
    this.offset = options.offset ?? 0;
    this.precision = options.precision ?? 0;

    if (!Number.isInteger(this.padding) || this.padding < 0) {
      throw new ValidationError(`Number codec padding must be a non-negative integer, got ${this.padding}`);
    }
    if (!Number.isInteger(this.precision) || this.precision < 0 || this.precision > 100) {
      throw new ValidationError(`Number codec precision must be an integer between 0 and 100, got ${this.precision}`);
    }
    if (!Number.isFinite(this.offset)) {
      throw new ValidationError(`Number codec offset must be finite, got ${this.offset}`);
    }
  }

  /**
   * Total width of an encoded value, sign included.
   */
  get width(): number {
    if (this.precision > 0 && this.padding > 0) {
      return this.padding + this.precision + 1;
    }
    return this.padding;
  }

  encode(value: number): string {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Cannot encode non-finite number ${value}`);
    }
    const shifted = value + this.offset;
    const digits = Math.abs(shifted).toFixed(this.precision);
    // Sign goes before the zeros and counts toward the width.
    if (shifted < 0 && Number(digits) !== 0) {
      return `-${digits.padStart(this.width - 1, '0')}`;
    }
    return digits.padStart(this.width, '0');
  }

  decode(raw: string): number {
    if (!DECIMAL_PATTERN.test(raw)) {
      throw new DecodeError(`Value '${raw}' is not a decimal number`, { raw });
    }
    return Number(raw) - this.offset;
  }
}
