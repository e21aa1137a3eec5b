export type PropertyValue = string | number | boolean;

export type PropertyMap = Record<string, PropertyValue>;

/** Tags every vertex and edge of one observed deployment of a topology. */
export type SnapshotScope = {
  topologyId: string;
  snapshotRef: string;
};

export const VERTEX_LABELS = ['Broker', 'Container', 'Spout', 'Bolt'] as const;
export type VertexLabel = (typeof VERTEX_LABELS)[number];

export const INSTANCE_LABELS = ['Spout', 'Bolt'] as const satisfies readonly VertexLabel[];
export type InstanceLabel = (typeof INSTANCE_LABELS)[number];

export const EDGE_LABELS = ['IS_WITHIN', 'LOGICALLY_CONNECTED', 'PHYSICALLY_CONNECTED'] as const;
export type EdgeLabel = (typeof EDGE_LABELS)[number];

export type BrokerProperties = SnapshotScope & {
  id: string;
  host: string;
  port: number;
  shellPort: number;
};

export type ContainerProperties = SnapshotScope & {
  id: number;
};

export type InstanceProperties = SnapshotScope & {
  container: number;
  taskId: number;
  component: string;
  brokerId: string;
};

export type SpoutProperties = InstanceProperties & {
  spoutType: string;
  spoutSource: string;
};

export type BoltProperties = InstanceProperties;

export type LogicalEdgeProperties = SnapshotScope & {
  streamName: string;
  grouping: string;
};

/**
 * A vertex staged for creation. `key` is unique within one snapshot and is
 * how edges refer to their endpoints before the store assigns ids.
 */
export type VertexRecord =
  | { key: string; label: 'Broker'; properties: BrokerProperties }
  | { key: string; label: 'Container'; properties: ContainerProperties }
  | { key: string; label: 'Spout'; properties: SpoutProperties }
  | { key: string; label: 'Bolt'; properties: BoltProperties };

export type InstanceVertexRecord = Extract<VertexRecord, { label: InstanceLabel }>;

export type EdgeRecord =
  | { label: 'IS_WITHIN'; from: string; to: string; properties: SnapshotScope }
  | { label: 'LOGICALLY_CONNECTED'; from: string; to: string; properties: LogicalEdgeProperties }
  | { label: 'PHYSICALLY_CONNECTED'; from: string; to: string; properties: SnapshotScope };

export type SnapshotDelta = {
  readonly scope: SnapshotScope;
  readonly vertices: readonly VertexRecord[];
  readonly edges: readonly EdgeRecord[];
};

export type LabelCounts<L extends string> = Record<L, number>;

export function brokerKey(brokerId: string): string {
  return `broker:${brokerId}`;
}

export function containerKey(container: number): string {
  return `container:${container}`;
}

export function instanceKey(instanceName: string): string {
  return `instance:${instanceName}`;
}

export function isInstanceVertex(vertex: VertexRecord): vertex is InstanceVertexRecord {
  return vertex.label === 'Spout' || vertex.label === 'Bolt';
}

export function countVertices(vertices: readonly { label: VertexLabel }[]): LabelCounts<VertexLabel> {
  const counts: LabelCounts<VertexLabel> = { Broker: 0, Container: 0, Spout: 0, Bolt: 0 };
  for (const vertex of vertices) {
    counts[vertex.label] += 1;
  }
  return counts;
}

export function countEdges(edges: readonly { label: EdgeLabel }[]): LabelCounts<EdgeLabel> {
  const counts: LabelCounts<EdgeLabel> = { IS_WITHIN: 0, LOGICALLY_CONNECTED: 0, PHYSICALLY_CONNECTED: 0 };
  for (const edge of edges) {
    counts[edge.label] += 1;
  }
  return counts;
}
