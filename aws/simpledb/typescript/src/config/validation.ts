/**
 * Configuration validation for the SimpleDB client.
 * @module config/validation
 */

import { z } from 'zod';
import { ConfigurationError } from '../error/index.js';
import type { SimpleDbConfig } from './config.js';

/**
 * Zod schema for configuration validation.
 */
const configSchema = z.object({
  accessKeyId: z.string().min(1, 'access key id is required'),
  secretAccessKey: z.string().min(1, 'secret access key is required'),
  host: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9.-]+(:\d{1,5})?$/, 'must be a host name with an optional port'),
  secure: z.boolean(),
  timeoutMs: z.number().int().positive(),
  signatureMethod: z.enum(['HmacSHA256', 'HmacSHA1']).optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']),
});

/**
 * Validates a configuration candidate.
 *
 * @returns The validated configuration
 * @throws {ConfigurationError} Listing every failing field
 */
export function validateConfig(config: unknown): SimpleDbConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join(', ')}`, { issues });
  }
  return result.data;
}
