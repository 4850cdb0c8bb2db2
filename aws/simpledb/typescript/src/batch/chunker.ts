/**
 * Array chunking utility for batch operations.
 */

import { ValidationError } from '../error/index.js';

/**
 * Splits an array into chunks of at most `size` items, preserving order.
 *
 * @example
 * ```typescript
 * chunk([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 * ```
 *
 * @throws {ValidationError} If `size` is not a positive integer
 */
export function chunk<T>(array: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size <= 0) {
    throw new ValidationError(`Chunk size must be a positive integer, got ${size}`);
  }

  const chunks: T[][] = [];
  for (let i = 0; i < array.length; i += size) {
    chunks.push(array.slice(i, i + size));
  }
  return chunks;
}
