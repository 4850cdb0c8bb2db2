/**
 * Metrics collection for SimpleDB calls
 */

export type MetricLabels = Record<string, string>;

export interface MetricsCollector {
  incrementCounter(name: string, value?: number, labels?: MetricLabels): void;
  recordHistogram(name: string, value: number, labels?: MetricLabels): void;
}

/**
 * Standard metric names
 */
export const SimpleDbMetricNames = {
  REQUESTS_TOTAL: 'simpledb_requests_total',
  REQUEST_DURATION: 'simpledb_request_duration_ms',
  BOX_USAGE: 'simpledb_box_usage',
  ERRORS: 'simpledb_errors_total',
  PAGES_FETCHED: 'simpledb_pages_fetched_total',
  BATCH_CHUNKS: 'simpledb_batch_chunks_total',
} as const;

export interface HistogramSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
}

/**
 * In-memory metrics collector for testing and development
 */
export class InMemoryMetricsCollector implements MetricsCollector {
  private readonly counters = new Map<string, number>();
  private readonly histograms = new Map<string, number[]>();

  incrementCounter(name: string, value: number = 1, labels?: MetricLabels): void {
    const key = this.makeKey(name, labels);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  recordHistogram(name: string, value: number, labels?: MetricLabels): void {
    const key = this.makeKey(name, labels);
    const values = this.histograms.get(key) ?? [];
    values.push(value);
    this.histograms.set(key, values);
  }

  /**
   * Get a specific counter value
   */
  getCounter(name: string, labels?: MetricLabels): number {
    return this.counters.get(this.makeKey(name, labels)) ?? 0;
  }

  /**
   * Get recorded values of a histogram
   */
  getHistogram(name: string, labels?: MetricLabels): number[] {
    return [...(this.histograms.get(this.makeKey(name, labels)) ?? [])];
  }

  /**
   * Summarise a histogram, or undefined when nothing was recorded
   */
  summarize(name: string, labels?: MetricLabels): HistogramSummary | undefined {
    const values = this.histograms.get(this.makeKey(name, labels));
    if (!values || values.length === 0) {
      return undefined;
    }
    return {
      count: values.length,
      sum: values.reduce((a, b) => a + b, 0),
      min: Math.min(...values),
      max: Math.max(...values),
    };
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }

  private makeKey(name: string, labels?: MetricLabels): string {
    if (!labels || Object.keys(labels).length === 0) {
      return name;
    }
    const labelStr = Object.entries(labels)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${k}=${v}`)
      .join(',');
    return `${name}:${labelStr}`;
  }
}

/**
 * No-op metrics collector
 */
export class NoopMetricsCollector implements MetricsCollector {
  incrementCounter(_name: string, _value?: number, _labels?: MetricLabels): void {
    // No-op
  }

  recordHistogram(_name: string, _value: number, _labels?: MetricLabels): void {
    // No-op
  }
}
