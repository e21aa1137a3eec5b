import type { LabelCounts } from '@topograph/topology-graph';
import type { MetricsRow } from '@topograph/metrics';

export function formatCounts<L extends string>(counts: LabelCounts<L>): string {
  return Object.entries(counts)
    .map(([label, count]) => `${label}=${String(count)}`)
    .join(' ');
}

export const METRICS_HEADER = 'timestamp,component,container,taskId,stream,sourceComponent,value';

export function formatMetricsRow(row: MetricsRow): string {
  return [
    row.timestamp.toISOString(),
    row.component,
    String(row.container),
    String(row.taskId),
    row.stream ?? '',
    row.sourceComponent ?? '',
    String(row.value)
  ].join(',');
}
