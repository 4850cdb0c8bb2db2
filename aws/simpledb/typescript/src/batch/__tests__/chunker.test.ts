/**
 * Tests for chunk
 */

import { describe, it, expect } from 'vitest';
import { chunk } from '../chunker.js';
import { ValidationError } from '../../error/index.js';

describe('chunk', () => {
  it('should keep order and put the remainder last', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should return no chunks for an empty array', () => {
    expect(chunk([], 25)).toEqual([]);
  });

  it('should reject non-positive sizes', () => {
    expect(() => chunk([1], 0)).toThrow(ValidationError);
    expect(() => chunk([1], 1.5)).toThrow(ValidationError);
  });
});
