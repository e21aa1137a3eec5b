/** One sample of one instance-level metric. */
export type MetricsRow = {
  timestamp: Date;
  component: string;
  container: number;
  taskId: number;
  /** Stream the metric is reported for, when it is stream scoped. */
  stream: string | null;
  /** Upstream component of the stream, for input-side metrics. */
  sourceComponent: string | null;
  value: number;
};

export type MetricsTable = MetricsRow[];

export type MetricsQueryOptions = {
  cluster?: string;
  environ?: string;
  /** Restrict the query to these components. */
  components?: string[];
};

/**
 * Time series of per-instance metrics for a running topology. Backends that
 * cannot serve a metric reject with MetricsCapabilityError.
 */
export interface TopologyMetricsClient {
  /** Execute latency of every bolt instance, per input stream. */
  getServiceTimes(topologyId: string, start: Date, end: Date, options?: MetricsQueryOptions): Promise<MetricsTable>;
  /** Tuples received by every bolt instance, per input stream. */
  getReceiveCounts(topologyId: string, start: Date, end: Date, options?: MetricsQueryOptions): Promise<MetricsTable>;
  /** Tuples emitted by every instance, per output stream. */
  getEmitCounts(topologyId: string, start: Date, end: Date, options?: MetricsQueryOptions): Promise<MetricsTable>;
  /** Tuples executed by every bolt instance, per input stream. */
  getExecuteCounts(topologyId: string, start: Date, end: Date, options?: MetricsQueryOptions): Promise<MetricsTable>;
}
