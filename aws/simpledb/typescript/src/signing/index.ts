/**
 * Request Signing
 */

export type { SignatureMethod, SigningCredentials, SignableRequest } from './types.js';
export { percentEncode, normalizedParameters, signatureBaseString, encodeFormBody } from './canonical.js';
export { RequestSigner, resolveSignatureMethod, formatTimestamp } from './signer.js';
