/**
 * Signature Version 2 request signer.
 */

import * as crypto from 'node:crypto';
import { signatureBaseString } from './canonical.js';
import type { SignableRequest, SignatureMethod, SigningCredentials } from './types.js';

const HASH_FOR_METHOD: Readonly<Record<SignatureMethod, string>> = {
  HmacSHA256: 'sha256',
  HmacSHA1: 'sha1',
};

/**
 * Picks HMAC-SHA256 when the runtime offers it, HMAC-SHA1 otherwise.
 */
export function resolveSignatureMethod(preferred?: SignatureMethod): SignatureMethod {
  if (preferred) {
    return preferred;
  }
  return crypto.getHashes().includes('sha256') ? 'HmacSHA256' : 'HmacSHA1';
}

/**
 * Formats a timestamp as `YYYY-MM-DDTHH:MM:SS` in UTC, without zone suffix.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19);
}

/**
 * Signs query-protocol requests.
 *
 * Signing is a pure function of the request, credentials and timestamp;
 * the caller supplies the clock.
 *
 * @example
 * ```typescript
 * const signer = new RequestSigner({ accessKeyId: 'test-key', secretAccessKey: 'test-secret' });
 * const params = signer.sign(
 *   { method: 'POST', host: 'sdb.amazonaws.com', path: '/', params: { Action: 'ListDomains' } },
 *   new Date()
 * );
 * ```
 */
export class RequestSigner {
  readonly method: SignatureMethod;

  constructor(
    private readonly credentials: SigningCredentials,
    method?: SignatureMethod
  ) {
    this.method = resolveSignatureMethod(method);
  }

  /**
   * Returns the parameters with authentication fields and `Signature` added.
   * The input is not modified.
   */
  sign(request: SignableRequest, timestamp: Date): Record<string, string> {
    const params: Record<string, string> = {
      ...request.params,
      AWSAccessKeyId: this.credentials.accessKeyId,
      SignatureVersion: '2',
      SignatureMethod: this.method,
      Timestamp: formatTimestamp(timestamp),
    };

    const baseString = signatureBaseString(request.method, request.host, request.path, params);
    params.Signature = this.hmac(baseString);
    return params;
  }

  private hmac(data: string): string {
    return crypto
      .createHmac(HASH_FOR_METHOD[this.method], this.credentials.secretAccessKey)
      .update(data, 'utf8')
      .digest('base64');
  }
}
