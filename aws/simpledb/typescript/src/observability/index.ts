/**
 * SimpleDB Observability
 *
 * Logging and metrics for SimpleDB calls.
 */

export type { Logger, LogLevel, LogContext, ConsoleLoggerOptions } from './logging.js';
export { ConsoleLogger, NoopLogger, logOperation, logError } from './logging.js';
export type { MetricsCollector, MetricLabels, HistogramSummary } from './metrics.js';
export { SimpleDbMetricNames, InMemoryMetricsCollector, NoopMetricsCollector } from './metrics.js';
