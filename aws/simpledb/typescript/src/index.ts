/**
 * AWS SimpleDB Integration
 *
 * Typed client for the SimpleDB query API: sort-preserving attribute codecs,
 * an immutable select-expression builder, signed transport with lazy
 * pagination, and chunked batch writes.
 *
 * @module aws-simpledb-client
 */

// ============================================================================
// Configuration
// ============================================================================

export type { SimpleDbConfig } from './config/index.js';
export {
  SimpleDbConfigBuilder,
  validateConfig,
  resolveEndpointUrl,
  DEFAULT_HOST,
  API_VERSION,
  MAX_BATCH_PUT_ITEMS,
} from './config/index.js';

// ============================================================================
// Error Handling
// ============================================================================

export {
  SimpleDbError,
  isSimpleDbError,
  ValidationError,
  ProtocolError,
  RemoteServiceError,
  NotFoundError,
  DecodeError,
  ConfigurationError,
  TransportError,
} from './error/index.js';
export type { SimpleDbErrorCode } from './error/index.js';

// ============================================================================
// Codecs
// ============================================================================

export type { AttributeScalar, AttributeCodec, CodecKind, CodecTable, AttributeEncoder } from './codec/index.js';
export {
  NumberCodec,
  BooleanCodec,
  TimestampCodec,
  OpaqueCodec,
  DEFAULT_TIMESTAMP_FORMAT,
  PassThroughEncoder,
  CodecTableEncoder,
  encodeWithCodec,
  decodeWithCodec,
} from './codec/index.js';

// ============================================================================
// Queries
// ============================================================================

export type {
  ComparisonOperator,
  Connector,
  Quantifier,
  ConditionValue,
  ConditionBindings,
  ItemNameConditions,
  Predicate,
  PredicateArgument,
  QuerySource,
  OrderBy,
  SortDirection,
} from './query/index.js';
export {
  where,
  every,
  itemName,
  and,
  or,
  merge,
  renderPredicate,
  PredicateLeaf,
  PredicateGroup,
  Query,
  ItemNameQuery,
  BaseQuery,
  RESERVED_KEYWORDS,
} from './query/index.js';

// ============================================================================
// Signing and Transport
// ============================================================================

export type { SignatureMethod, SigningCredentials, SignableRequest } from './signing/index.js';
export { RequestSigner, signatureBaseString, percentEncode, formatTimestamp } from './signing/index.js';
export type { HttpTransport, HttpRequest, HttpResponse } from './http/index.js';
export { FetchTransport } from './http/index.js';
export type { ResponseMetadata, ResponseEnvelope, Page } from './xml/index.js';

// ============================================================================
// Client
// ============================================================================

export { SimpleDbClient, createSimpleDbClient, Paginator } from './client/index.js';
export type {
  DomainRef,
  AttributeUpdate,
  AttributeInput,
  BatchItem,
  DomainMetadata,
  SimpleDbClientOptions,
} from './client/index.js';
export { Domain, Item } from './domain/index.js';
export type { AttributeValue, ItemAttributes } from './domain/index.js';
export { BatchWriter, chunk } from './batch/index.js';
export type { BatchWriteResult, BatchWriterOptions } from './batch/index.js';

// ============================================================================
// Observability
// ============================================================================

export type { Logger, LogLevel, LogContext, ConsoleLoggerOptions, MetricsCollector } from './observability/index.js';
export {
  ConsoleLogger,
  NoopLogger,
  InMemoryMetricsCollector,
  NoopMetricsCollector,
  SimpleDbMetricNames,
} from './observability/index.js';
