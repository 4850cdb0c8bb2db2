/**
 * Default configuration values for the SimpleDB client.
 * @module config/defaults
 */

/**
 * Default service host.
 */
export const DEFAULT_HOST = 'sdb.amazonaws.com';

/**
 * SimpleDB API version sent with every request.
 */
export const API_VERSION = '2009-04-15';

/**
 * XML namespace of API responses.
 */
export const API_NAMESPACE = `http://sdb.amazonaws.com/doc/${API_VERSION}/`;

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_TIMEOUT_MS = 30000;

/**
 * Maximum items per BatchPutAttributes request.
 */
export const MAX_BATCH_PUT_ITEMS = 25;

/**
 * Page size requested from ListDomains.
 */
export const LIST_DOMAINS_PAGE_SIZE = 100;
