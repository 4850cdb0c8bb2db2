/**
 * HTTP types for the SimpleDB query protocol.
 *
 * @module http/types
 */

/**
 * HTTP methods used by the query protocol.
 */
export type HttpMethod = 'GET' | 'POST';

/**
 * HTTP request structure.
 *
 * @example
 * ```typescript
 * const request: HttpRequest = {
 *   method: 'POST',
 *   url: 'https://sdb.amazonaws.com/',
 *   headers: { 'Content-Type': 'application/x-www-form-urlencoded; charset=utf-8' },
 *   body: 'Action=ListDomains&Version=2009-04-15',
 * };
 * ```
 */
export interface HttpRequest {
  method: HttpMethod;
  /** Absolute request URL. */
  url: string;
  headers: Record<string, string>;
  body?: string;
}

/**
 * HTTP response structure. Header names are lower-cased.
 */
export interface HttpResponse {
  status: number;
  headers: Record<string, string>;
  body: string;
}

/**
 * Transport options.
 */
export interface HttpTransportConfig {
  /** Request timeout in milliseconds. */
  timeoutMs?: number;
}
