/**
 * Signature Version 2 Types
 */

/**
 * HMAC algorithm named in the `SignatureMethod` parameter.
 */
export type SignatureMethod = 'HmacSHA256' | 'HmacSHA1';

/**
 * Credentials used to sign requests.
 */
export interface SigningCredentials {
  accessKeyId: string;
  secretAccessKey: string;
}

/**
 * A request to be signed. Parameters are the unsigned form fields.
 */
export interface SignableRequest {
  /** HTTP method */
  method: string;
  /** Host header value, port included if non-default */
  host: string;
  /** Request path, '/' when empty */
  path: string;
  /** Form parameters */
  params: Readonly<Record<string, string>>;
}
