/**
 * HTTP Transport
 */

export type { HttpMethod, HttpRequest, HttpResponse, HttpTransportConfig } from './types.js';
export type { HttpTransport } from './transport.js';
export { FetchTransport } from './transport.js';
