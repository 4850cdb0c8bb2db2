/**
 * Error codes surfaced by the SimpleDB client.
 */
export type SimpleDbErrorCode =
  | 'VALIDATION' // Malformed predicate, query or write request
  | 'PROTOCOL' // Response missing an expected structural element
  | 'REMOTE_SERVICE' // Structured error payload returned by SimpleDB
  | 'NOT_FOUND' // Identifier-keyed lookup found no item
  | 'DECODE' // Stored value does not decode under its codec
  | 'CONFIGURATION' // Invalid client configuration
  | 'TRANSPORT'; // Network failure or timeout

/**
 * Base error class for all SimpleDB errors.
 * Carries the error code, the SimpleDB request id and HTTP status when the
 * error originated from a response, and optional structured details.
 */
export class SimpleDbError extends Error {
  /**
   * Error category.
   */
  public readonly code: SimpleDbErrorCode;

  /**
   * SimpleDB request id, when the error came from a response.
   */
  public readonly requestId?: string;

  /**
   * HTTP status code associated with the error, if applicable.
   */
  public readonly statusCode?: number;

  /**
   * Additional error details.
   */
  public readonly details?: Record<string, unknown>;

  constructor(options: {
    code: SimpleDbErrorCode;
    message: string;
    requestId?: string;
    statusCode?: number;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'SimpleDbError';
    this.code = options.code;
    this.requestId = options.requestId;
    this.statusCode = options.statusCode;
    this.details = options.details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Returns a string representation of the error
   */
  override toString(): string {
    let result = `${this.name} [${this.code}]: ${this.message}`;
    if (this.statusCode) {
      result += ` (HTTP ${this.statusCode})`;
    }
    if (this.requestId) {
      result += ` [request ${this.requestId}]`;
    }
    return result;
  }

  /**
   * Returns a JSON representation of the error
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      requestId: this.requestId,
      statusCode: this.statusCode,
      details: this.details,
    };
  }
}

/**
 * Type guard to check if an error is a SimpleDbError.
 */
export function isSimpleDbError(error: unknown): error is SimpleDbError {
  return error instanceof SimpleDbError;
}
