/**
 * SimpleDB Configuration
 */

export type { SimpleDbConfig } from './config.js';
export { SimpleDbConfigBuilder, resolveEndpointUrl } from './config.js';
export { validateConfig } from './validation.js';
export {
  DEFAULT_HOST,
  API_VERSION,
  API_NAMESPACE,
  DEFAULT_TIMEOUT_MS,
  MAX_BATCH_PUT_ITEMS,
  LIST_DOMAINS_PAGE_SIZE,
} from './defaults.js';
