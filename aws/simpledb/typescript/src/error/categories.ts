/**
 * Concrete error categories.
 *
 * None of these are retried by the client; retry policy belongs to the caller.
 */

import { SimpleDbError } from './error.js';

/**
 * Malformed predicate, query or write request. Raised synchronously while
 * building, before any network call.
 */
export class ValidationError extends SimpleDbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'VALIDATION', message, details });
    this.name = 'ValidationError';
  }
}

/**
 * A response did not have the structure the protocol promises.
 */
export class ProtocolError extends SimpleDbError {
  constructor(
    message: string,
    options: { requestId?: string; statusCode?: number; details?: Record<string, unknown>; cause?: unknown } = {}
  ) {
    super({ code: 'PROTOCOL', message, ...options });
    this.name = 'ProtocolError';
  }
}

/**
 * SimpleDB answered with an `Errors/Error` payload. The message is the
 * service's text, unchanged.
 */
export class RemoteServiceError extends SimpleDbError {
  /**
   * Service error code, e.g. `NoSuchDomain` or `InvalidQueryExpression`.
   */
  public readonly errorCode: string;

  /**
   * Box usage charged for the failed request, when reported.
   */
  public readonly boxUsage?: number;

  constructor(options: {
    message: string;
    errorCode: string;
    requestId?: string;
    statusCode?: number;
    boxUsage?: number;
  }) {
    super({
      code: 'REMOTE_SERVICE',
      message: options.message,
      requestId: options.requestId,
      statusCode: options.statusCode,
      details: { errorCode: options.errorCode },
    });
    this.name = 'RemoteServiceError';
    this.errorCode = options.errorCode;
    this.boxUsage = options.boxUsage;
  }
}

/**
 * Identifier-keyed single item lookup matched nothing.
 */
export class NotFoundError extends SimpleDbError {
  public readonly itemName: string;

  constructor(itemName: string, domain?: string) {
    super({
      code: 'NOT_FOUND',
      message: domain ? `Item '${itemName}' does not exist in domain '${domain}'` : `Item '${itemName}' does not exist`,
      details: { itemName, domain },
    });
    this.name = 'NotFoundError';
    this.itemName = itemName;
  }
}

/**
 * A stored string could not be decoded under its attribute's codec.
 */
export class DecodeError extends SimpleDbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'DECODE', message, details });
    this.name = 'DecodeError';
  }
}

/**
 * Client configuration is invalid.
 */
export class ConfigurationError extends SimpleDbError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ code: 'CONFIGURATION', message, details });
    this.name = 'ConfigurationError';
  }
}

/**
 * The HTTP exchange itself failed (network error or timeout).
 */
export class TransportError extends SimpleDbError {
  constructor(message: string, cause?: unknown) {
    super({ code: 'TRANSPORT', message, cause });
    this.name = 'TransportError';
  }
}
