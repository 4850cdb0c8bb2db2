/**
 * Canonical string building for Signature Version 2.
 */

/**
 * RFC 3986 percent-encoding.
 *
 * Only `A-Z a-z 0-9 - _ . ~` stay literal; space is `%20`, never `+`.
 *
 * @example
 * ```typescript
 * percentEncode("it's (a) test*"); // 'it%27s%20%28a%29%20test%2A'
 * ```
 */
export function percentEncode(input: string): string {
  return encodeURIComponent(input)
    .replace(/!/g, '%21')
    .replace(/'/g, '%27')
    .replace(/\(/g, '%28')
    .replace(/\)/g, '%29')
    .replace(/\*/g, '%2A');
}

function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Sorted, encoded `name=value` pairs joined with `&`.
 *
 * Pairs are sorted by name in byte order. `Signature` is never included.
 */
export function normalizedParameters(params: Readonly<Record<string, string>>): string {
  return Object.keys(params)
    .filter((name) => name !== 'Signature')
    .sort(compareCodeUnits)
    .map((name) => `${percentEncode(name)}=${percentEncode(params[name] ?? '')}`)
    .join('&');
}

/**
 * The string the HMAC is computed over:
 * method, lower-cased host, path and normalized parameters, one per line.
 */
export function signatureBaseString(
  method: string,
  host: string,
  path: string,
  params: Readonly<Record<string, string>>
): string {
  return [method.toUpperCase(), host.toLowerCase(), path || '/', normalizedParameters(params)].join('\n');
}

/**
 * Form-encodes parameters for a request body, in the same order as signing.
 */
export function encodeFormBody(params: Readonly<Record<string, string>>): string {
  return Object.keys(params)
    .sort(compareCodeUnits)
    .map((name) => `${percentEncode(name)}=${percentEncode(params[name] ?? '')}`)
    .join('&');
}
