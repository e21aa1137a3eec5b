import { Command, InvalidArgumentError, Option } from 'commander';
import type { MetricsTable, TopologyMetricsClient } from '@topograph/metrics';
import { resolveEnvironment, runAction } from '../context';
import type { CliContext } from '../context';
import { METRICS_HEADER, formatMetricsRow } from '../lib/format';

const METRIC_KINDS = ['service-times', 'receive-counts', 'emit-counts', 'execute-counts'] as const;

type MetricKind = (typeof METRIC_KINDS)[number];

type MetricsOptions = {
  kind: MetricKind;
  cluster: string;
  environ: string;
  start: Date;
  end: Date;
  component?: string[];
};

function parseTimestamp(value: string): Date {
  const parsed = new Date(value);
  if (Number.isNaN(parsed.getTime())) {
    throw new InvalidArgumentError('Expected an ISO 8601 timestamp.');
  }
  return parsed;
}

function collectComponent(value: string, previous: string[] | undefined): string[] {
  return [...(previous ?? []), value];
}

function query(
  client: TopologyMetricsClient,
  topologyId: string,
  opts: MetricsOptions
): Promise<MetricsTable> {
  const options = { components: opts.component };
  switch (opts.kind) {
    case 'service-times':
      return client.getServiceTimes(topologyId, opts.start, opts.end, options);
    case 'receive-counts':
      return client.getReceiveCounts(topologyId, opts.start, opts.end, options);
    case 'emit-counts':
      return client.getEmitCounts(topologyId, opts.start, opts.end, options);
    case 'execute-counts':
      return client.getExecuteCounts(topologyId, opts.start, opts.end, options);
  }
}

async function printMetrics(context: CliContext, topologyId: string, opts: MetricsOptions): Promise<void> {
  if (opts.end.getTime() < opts.start.getTime()) {
    throw new Error('--end must not be earlier than --start');
  }
  const { config, logger } = resolveEnvironment(context);
  const client = context.createMetricsClient(config, { cluster: opts.cluster, environ: opts.environ }, logger);
  const rows = await query(client, topologyId, opts);

  context.stdout(METRICS_HEADER);
  for (const row of rows) {
    context.stdout(formatMetricsRow(row));
  }
}

export function registerMetricsCommand(program: Command, context: CliContext): void {
  program
    .command('metrics <topologyId>')
    .description('Print instance metrics of a running topology as CSV')
    .addOption(new Option('--kind <kind>', 'Metric to read').choices(METRIC_KINDS).makeOptionMandatory())
    .requiredOption('--cluster <cluster>', 'Cluster the topology runs on')
    .requiredOption('--environ <environ>', 'Environment the topology runs in')
    .requiredOption('--start <timestamp>', 'Start of the window (ISO 8601)', parseTimestamp)
    .requiredOption('--end <timestamp>', 'End of the window (ISO 8601)', parseTimestamp)
    .option('--component <name>', 'Restrict to a component (repeatable)', collectComponent)
    .action(async (topologyId: string, opts: MetricsOptions) => {
      await runAction(context, () => printMetrics(context, topologyId, opts));
    });
}
