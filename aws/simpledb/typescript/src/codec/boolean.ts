/**
 * Boolean codec.
 */

import { DecodeError } from '../error/index.js';

/**
 * Maps `true`/`false` to `'1'`/`'0'` and back. Any other stored value is
 * a decode error.
 */
export class BooleanCodec {
  readonly kind = 'boolean' as const;

  encode(value: boolean): string {
    return value ? '1' : '0';
  }

  decode(raw: string): boolean {
    if (raw === '1') return true;
    if (raw === '0') return false;
    throw new DecodeError(`Value '${raw}' is not a boolean ('1' or '0')`, { raw });
  }
}
