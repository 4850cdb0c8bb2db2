/**
 * Identity codec for attributes stored as-is.
 */
export class OpaqueCodec {
  readonly kind = 'opaque' as const;

  encode(value: string): string {
    return value;
  }

  decode(raw: string): string {
    return raw;
  }
}
