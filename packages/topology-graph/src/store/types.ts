import type {
  EdgeLabel,
  LabelCounts,
  PropertyMap,
  PropertyValue,
  SnapshotDelta,
  SnapshotScope,
  VertexLabel
} from '../model';

export type VertexHandle = {
  id: string;
  label: VertexLabel;
  properties: PropertyMap;
};

export type EdgeHandle = {
  id: string;
  label: EdgeLabel;
  from: string;
  to: string;
  properties: PropertyMap;
};

/** Conjunctive equality filter. */
export type VertexQuery = {
  label?: VertexLabel | readonly VertexLabel[];
  where?: Record<string, PropertyValue>;
};

export type EdgeQuery = {
  label?: EdgeLabel;
  where?: Record<string, PropertyValue>;
};

export type SnapshotWriteResult = {
  removedVertices: number;
  vertices: LabelCounts<VertexLabel>;
  edges: LabelCounts<EdgeLabel>;
};

export interface GraphStore {
  addVertex(label: VertexLabel, properties: PropertyMap): Promise<VertexHandle>;
  addEdge(from: VertexHandle, label: EdgeLabel, to: VertexHandle, properties: PropertyMap): Promise<EdgeHandle>;
  findVertices(query: VertexQuery): Promise<VertexHandle[]>;
  findEdges(query: EdgeQuery): Promise<EdgeHandle[]>;

  /**
   * Removes every vertex and edge tagged with the delta's scope and writes
   * the delta, as one atomic operation.
   */
  replaceSnapshot(delta: SnapshotDelta): Promise<SnapshotWriteResult>;

  /** Removes a snapshot; resolves to the number of vertices removed. */
  dropSnapshot(scope: SnapshotScope): Promise<number>;

  close(): Promise<void>;
}

export function scopeFilter(scope: SnapshotScope): Record<string, PropertyValue> {
  return { topologyId: scope.topologyId, snapshotRef: scope.snapshotRef };
}
