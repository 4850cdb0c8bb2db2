/**
 * Batch Operations
 */

export { chunk } from './chunker.js';
export { BatchWriter } from './writer.js';
export type { BatchWriteResult, BatchWriterOptions } from './writer.js';
