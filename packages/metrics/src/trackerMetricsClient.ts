import type { Logger } from '@topograph/shared';
import { silentLogger } from '@topograph/shared';
import { parseInstanceName } from '@topograph/topology-graph';
import type { LogicalPlan, MetricsTimeline, MetricsTimelineQuery } from '@topograph/tracker-client';
import { MetricsCapabilityError } from './errors';
import type { MetricsQueryOptions, MetricsRow, MetricsTable, TopologyMetricsClient } from './types';

export type TrackerMetricsSource = {
  getLogicalPlan(cluster: string, environ: string, topologyId: string): Promise<LogicalPlan>;
  getMetricsTimeline(query: MetricsTimelineQuery): Promise<MetricsTimeline>;
};

export type TrackerMetricsClientOptions = {
  tracker: TrackerMetricsSource;
  cluster: string;
  environ: string;
  logger?: Logger;
};

/** A tracker metric and the stream it describes. */
type MetricSeries = {
  metricName: string;
  stream: string;
  sourceComponent: string | null;
};

type QueryWindow = {
  topologyId: string;
  start: Date;
  end: Date;
  cluster: string;
  environ: string;
};

const BACKEND = 'tracker';

function inputSeries(prefix: string, logicalPlan: LogicalPlan, component: string): MetricSeries[] {
  const bolt = logicalPlan.bolts[component];
  if (!bolt) {
    return [];
  }
  return bolt.inputs.map((input) => ({
    metricName: `${prefix}/${input.componentName}/${input.streamName}`,
    stream: input.streamName,
    sourceComponent: input.componentName
  }));
}

function outputSeries(logicalPlan: LogicalPlan, component: string): MetricSeries[] {
  const outputs = logicalPlan.spouts[component]?.outputs ?? logicalPlan.bolts[component]?.outputs ?? [];
  return outputs.map((stream) => ({ metricName: `__emit-count/${stream}`, stream, sourceComponent: null }));
}

/**
 * Reads instance metrics from the tracker's metrics timeline. The tracker
 * reports no receive counts, so that query is rejected.
 */
export class TrackerMetricsClient implements TopologyMetricsClient {
  private readonly tracker: TrackerMetricsSource;
  private readonly cluster: string;
  private readonly environ: string;
  private readonly logger: Logger;

  constructor(options: TrackerMetricsClientOptions) {
    this.tracker = options.tracker;
    this.cluster = options.cluster;
    this.environ = options.environ;
    this.logger = options.logger ?? silentLogger;
  }

  async getServiceTimes(
    topologyId: string,
    start: Date,
    end: Date,
    options: MetricsQueryOptions = {}
  ): Promise<MetricsTable> {
    return this.collect(this.window(topologyId, start, end, options), options, 'bolts', (plan, component) =>
      inputSeries('__execute-latency', plan, component)
    );
  }

  async getReceiveCounts(topologyId: string, start: Date, end: Date): Promise<MetricsTable> {
    this.logger.warn({ topologyId, start, end }, 'receive counts requested from the tracker');
    throw new MetricsCapabilityError(BACKEND, 'receive counts');
  }

  async getEmitCounts(topologyId: string, start: Date, end: Date, options: MetricsQueryOptions = {}): Promise<MetricsTable> {
    return this.collect(this.window(topologyId, start, end, options), options, 'all', outputSeries);
  }

  async getExecuteCounts(
    topologyId: string,
    start: Date,
    end: Date,
    options: MetricsQueryOptions = {}
  ): Promise<MetricsTable> {
    return this.collect(this.window(topologyId, start, end, options), options, 'bolts', (plan, component) =>
      inputSeries('__execute-count', plan, component)
    );
  }

  private window(topologyId: string, start: Date, end: Date, options: MetricsQueryOptions): QueryWindow {
    return {
      topologyId,
      start,
      end,
      cluster: options.cluster ?? this.cluster,
      environ: options.environ ?? this.environ
    };
  }

  private async collect(
    window: QueryWindow,
    options: MetricsQueryOptions,
    scope: 'bolts' | 'all',
    seriesFor: (plan: LogicalPlan, component: string) => MetricSeries[]
  ): Promise<MetricsTable> {
    const plan = await this.tracker.getLogicalPlan(window.cluster, window.environ, window.topologyId);
    const declared =
      scope === 'bolts' ? Object.keys(plan.bolts) : [...Object.keys(plan.spouts), ...Object.keys(plan.bolts)];
    const components = options.components ? declared.filter((name) => options.components?.includes(name)) : declared;

    const rows: MetricsTable = [];
    for (const component of components) {
      const series = seriesFor(plan, component);
      if (series.length === 0) {
        continue;
      }

      const timeline = await this.tracker.getMetricsTimeline({
        cluster: window.cluster,
        environ: window.environ,
        topology: window.topologyId,
        component,
        metricNames: series.map((entry) => entry.metricName),
        start: window.start,
        end: window.end
      });
      rows.push(...toRows(component, series, timeline));
    }

    this.logger.debug(
      { topologyId: window.topologyId, components: components.length, rows: rows.length },
      'collected tracker metrics'
    );
    return rows;
  }
}

function toRows(component: string, series: MetricSeries[], timeline: MetricsTimeline): MetricsRow[] {
  const rows: MetricsRow[] = [];
  for (const entry of series) {
    const instances = timeline.timeline[entry.metricName] ?? {};
    for (const [instanceName, samples] of Object.entries(instances)) {
      const { container, taskId } = parseInstanceName(instanceName);
      for (const sample of samples) {
        rows.push({
          timestamp: sample.timestamp,
          component,
          container,
          taskId,
          stream: entry.stream,
          sourceComponent: entry.sourceComponent,
          value: sample.value
        });
      }
    }
  }
  return rows;
}
