export type TokenSupplier = string | (() => string | Promise<string>);

export interface TrackerClientOptions {
  baseUrl: string;
  token?: TokenSupplier;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  fetchTimeoutMs?: number;
}

export type SpoutComponent = {
  spoutType: string;
  spoutSource: string;
  outputs: string[];
};

export type BoltInput = {
  componentName: string;
  streamName: string;
  grouping: string;
};

export type BoltComponent = {
  inputs: BoltInput[];
  outputs: string[];
};

/** Component-level dataflow of a topology, keyed by component name. */
export type LogicalPlan = {
  spouts: Record<string, SpoutComponent>;
  bolts: Record<string, BoltComponent>;
};

export type BrokerEntry = {
  id: string;
  host: string;
  port: number;
  shellPort: number;
};

export type InstanceAssignment = {
  brokerId: string;
};

/**
 * Deployment of a topology: brokers (stream managers) keyed by id, the
 * instance names of every component, and the broker each instance uses.
 */
export type PhysicalPlan = {
  brokers: Record<string, BrokerEntry>;
  spouts: Record<string, string[]>;
  bolts: Record<string, string[]>;
  instances: Record<string, InstanceAssignment>;
};

export interface PlanSource {
  getLogicalPlan(cluster: string, environ: string, topologyId: string): Promise<LogicalPlan>;
  getPhysicalPlan(cluster: string, environ: string, topologyId: string): Promise<PhysicalPlan>;
}

export type MetricsTimelineQuery = {
  cluster: string;
  environ: string;
  topology: string;
  component: string;
  metricNames: string[];
  start: Date;
  end: Date;
  instances?: string[];
};

export type MetricSample = {
  timestamp: Date;
  value: number;
};

export type MetricsTimeline = {
  component: string;
  start: Date;
  end: Date;
  /** metric name -> instance name -> samples ordered by timestamp */
  timeline: Record<string, Record<string, MetricSample[]>>;
};
