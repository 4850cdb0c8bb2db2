/**
 * Configuration types and builder for the SimpleDB client.
 * @module config
 */

import type { LogLevel } from '../observability/logging.js';
import type { SignatureMethod } from '../signing/types.js';
import { DEFAULT_HOST, DEFAULT_TIMEOUT_MS } from './defaults.js';
import { validateConfig } from './validation.js';

/**
 * Resolved client configuration.
 */
export interface SimpleDbConfig {
  /** Access key identifier sent as `AWSAccessKeyId`. */
  readonly accessKeyId: string;
  /** Shared secret used for HMAC signing. Never sent over the wire. */
  readonly secretAccessKey: string;
  /**
   * Service host, optionally with a port.
   * @example 'sdb.eu-west-1.amazonaws.com', 'localhost:8080'
   */
  readonly host: string;
  /** Use HTTPS. */
  readonly secure: boolean;
  /** Request timeout in milliseconds. */
  readonly timeoutMs: number;
  /** Force a signature method instead of picking the strongest available. */
  readonly signatureMethod?: SignatureMethod;
  /** Minimum level for the default console logger. */
  readonly logLevel: LogLevel;
}

/**
 * Fluent builder for creating SimpleDbConfig objects.
 *
 * @example
 * ```typescript
 * const config = new SimpleDbConfigBuilder()
 *   .credentials('test-access-key', 'test-secret')
 *   .host('sdb.eu-west-1.amazonaws.com')
 *   .build();
 * ```
 */
export class SimpleDbConfigBuilder {
  private config: Partial<{ -readonly [K in keyof SimpleDbConfig]: SimpleDbConfig[K] }> = {};

  /**
   * Sets static credentials.
   */
  credentials(accessKeyId: string, secretAccessKey: string): this {
    this.config.accessKeyId = accessKeyId;
    this.config.secretAccessKey = secretAccessKey;
    return this;
  }

  /**
   * Sets the service host.
   */
  host(host: string): this {
    this.config.host = host;
    return this;
  }

  /**
   * Sets the endpoint from a URL, taking scheme and host from it.
   */
  endpoint(url: string): this {
    const parsed = new URL(url);
    this.config.host = parsed.host;
    this.config.secure = parsed.protocol === 'https:';
    return this;
  }

  /**
   * Chooses between HTTPS and plain HTTP.
   */
  secure(secure: boolean): this {
    this.config.secure = secure;
    return this;
  }

  /**
   * Sets the request timeout.
   */
  timeout(timeoutMs: number): this {
    this.config.timeoutMs = timeoutMs;
    return this;
  }

  /**
   * Forces a signature method.
   */
  signatureMethod(method: SignatureMethod): this {
    this.config.signatureMethod = method;
    return this;
  }

  /**
   * Sets the default logger level.
   */
  logLevel(level: LogLevel): this {
    this.config.logLevel = level;
    return this;
  }

  /**
   * Applies defaults, validates and returns the configuration.
   *
   * @throws {ConfigurationError} If any field is missing or invalid
   */
  build(): SimpleDbConfig {
    return validateConfig({
      host: DEFAULT_HOST,
      secure: true,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      logLevel: 'warn',
      ...this.config,
    });
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: SimpleDbConfig): SimpleDbConfigBuilder {
    const builder = new SimpleDbConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}

/**
 * Base URL requests are posted to.
 */
export function resolveEndpointUrl(config: Pick<SimpleDbConfig, 'host' | 'secure'>): string {
  return `${config.secure ? 'https' : 'http'}://${config.host}/`;
}
