/**
 * Timestamp codec with strftime-style patterns.
 */

import { DecodeError, ValidationError } from '../error/index.js';

/**
 * Default pattern. Every field is fixed width, so string order is
 * chronological order.
 */
export const DEFAULT_TIMESTAMP_FORMAT = '%Y-%m-%dT%H:%M:%S';

type Field = 'year' | 'month' | 'day' | 'hour' | 'minute' | 'second' | 'micros';

type Segment = { type: 'literal'; text: string } | { type: 'field'; field: Field; width: number };

const DIRECTIVES: Readonly<Record<string, { field: Field; width: number }>> = {
  Y: { field: 'year', width: 4 },
  m: { field: 'month', width: 2 },
  d: { field: 'day', width: 2 },
  H: { field: 'hour', width: 2 },
  M: { field: 'minute', width: 2 },
  S: { field: 'second', width: 2 },
  f: { field: 'micros', width: 6 },
};

function compilePattern(format: string): Segment[] {
  const segments: Segment[] = [];
  let literal = '';

  for (let i = 0; i < format.length; i++) {
    const ch = format.charAt(i);
    if (ch !== '%') {
      literal += ch;
      continue;
    }
    const directive = format.charAt(i + 1);
    i++;
    if (directive === '%') {
      literal += '%';
      continue;
    }
    const spec = DIRECTIVES[directive];
    if (!spec) {
      throw new ValidationError(`Unsupported timestamp directive '%${directive}' in '${format}'`, {
        format,
      });
    }
    if (literal) {
      segments.push({ type: 'literal', text: literal });
      literal = '';
    }
    segments.push({ type: 'field', ...spec });
  }

  if (literal) {
    segments.push({ type: 'literal', text: literal });
  }
  return segments;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Encodes dates as UTC strings using a strftime-style pattern.
 *
 * Supported directives: `%Y %m %d %H %M %S %f %%`. `%f` is microseconds;
 * dates only carry milliseconds, so the last three digits are always zero.
 */
export class TimestampCodec {
  readonly kind = 'timestamp' as const;
  readonly format: string;
  private readonly segments: Segment[];
  private readonly matcher: RegExp;

  constructor(format: string = DEFAULT_TIMESTAMP_FORMAT) {
    this.format = format;
    this.segments = compilePattern(format);
    const source = this.segments
      .map((s) => (s.type === 'literal' ? escapeRegExp(s.text) : `(\\d{${s.width}})`))
      .join('');
    this.matcher = new RegExp(`^${source}$`);
  }

  encode(value: Date): string {
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError('Cannot encode an invalid date');
    }
    const parts: Record<Field, number> = {
      year: value.getUTCFullYear(),
      month: value.getUTCMonth() + 1,
      day: value.getUTCDate(),
      hour: value.getUTCHours(),
      minute: value.getUTCMinutes(),
      second: value.getUTCSeconds(),
      micros: value.getUTCMilliseconds() * 1000,
    };
    return this.segments
      .map((s) => (s.type === 'literal' ? s.text : String(parts[s.field]).padStart(s.width, '0')))
      .join('');
  }

  decode(raw: string): Date {
    const match = this.matcher.exec(raw);
    if (!match) {
      throw new DecodeError(`Value '${raw}' does not match timestamp format '${this.format}'`, {
        raw,
        format: this.format,
      });
    }

    const parts: Record<Field, number> = {
      year: 1900,
      month: 1,
      day: 1,
      hour: 0,
      minute: 0,
      second: 0,
      micros: 0,
    };
    let group = 1;
    for (const segment of this.segments) {
      if (segment.type === 'field') {
        parts[segment.field] = Number(match[group]);
        group++;
      }
    }

    const date = new Date(
      Date.UTC(
        parts.year,
        parts.month - 1,
        parts.day,
        parts.hour,
        parts.minute,
        parts.second,
        Math.floor(parts.micros / 1000)
      )
    );
    // Date.UTC rolls 2024-02-30 over to March; reject instead.
    if (
      date.getUTCFullYear() !== parts.year ||
      date.getUTCMonth() !== parts.month - 1 ||
      date.getUTCDate() !== parts.day ||
      date.getUTCHours() !== parts.hour ||
      date.getUTCMinutes() !== parts.minute ||
      date.getUTCSeconds() !== parts.second
    ) {
      throw new DecodeError(`Value '${raw}' is not a valid date`, { raw, format: this.format });
    }
    return date;
  }
}
