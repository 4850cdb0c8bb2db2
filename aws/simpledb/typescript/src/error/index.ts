/**
 * SimpleDB Error Handling
 */

export { SimpleDbError, isSimpleDbError } from './error.js';
export type { SimpleDbErrorCode } from './error.js';

export {
  ValidationError,
  ProtocolError,
  RemoteServiceError,
  NotFoundError,
  DecodeError,
  ConfigurationError,
  TransportError,
} from './categories.js';
