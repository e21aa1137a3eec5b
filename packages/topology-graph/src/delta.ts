import { LookupError, TopologyGraphError } from './errors';
import type {
  EdgeLabel,
  EdgeRecord,
  PropertyMap,
  PropertyValue,
  SnapshotDelta,
  SnapshotScope,
  VertexLabel,
  VertexRecord
} from './model';

export type VertexPredicate = {
  label?: VertexLabel | readonly VertexLabel[];
  where?: Record<string, PropertyValue>;
};

export function matchesLabel(label: VertexLabel, filter: VertexPredicate['label']): boolean {
  if (filter === undefined) {
    return true;
  }
  return typeof filter === 'string' ? filter === label : filter.includes(label);
}

export function matchesProperties(properties: PropertyMap, where: Record<string, PropertyValue> | undefined): boolean {
  if (!where) {
    return true;
  }
  return Object.entries(where).every(([key, value]) => properties[key] === value);
}

function edgeIdentity(edge: Pick<EdgeRecord, 'label' | 'from' | 'to'>): string {
  return `${edge.label}|${edge.from}|${edge.to}`;
}

/**
 * Accumulates the vertices and edges of one snapshot in memory. Lookups run
 * against what has been staged so far, so steps must be applied in order.
 */
export class SnapshotDeltaBuilder {
  readonly scope: SnapshotScope;
  private readonly vertices = new Map<string, VertexRecord>();
  private readonly edges: EdgeRecord[] = [];
  private readonly edgeIdentities = new Set<string>();

  constructor(scope: SnapshotScope) {
    this.scope = { topologyId: scope.topologyId, snapshotRef: scope.snapshotRef };
  }

  addVertex(vertex: VertexRecord): VertexRecord {
    if (this.vertices.has(vertex.key)) {
      throw new TopologyGraphError(`Vertex ${vertex.key} is already staged for snapshot ${this.scope.snapshotRef}`);
    }
    this.vertices.set(vertex.key, vertex);
    return vertex;
  }

  getVertex(key: string): VertexRecord | undefined {
    return this.vertices.get(key);
  }

  requireVertex(key: string): VertexRecord {
    const vertex = this.vertices.get(key);
    if (!vertex) {
      throw new LookupError(`No vertex ${key} in snapshot ${this.scope.topologyId}/${this.scope.snapshotRef}`);
    }
    return vertex;
  }

  findVertices(predicate: VertexPredicate = {}): VertexRecord[] {
    const matches: VertexRecord[] = [];
    for (const vertex of this.vertices.values()) {
      if (matchesLabel(vertex.label, predicate.label) && matchesProperties(vertex.properties, predicate.where)) {
        matches.push(vertex);
      }
    }
    return matches;
  }

  addEdge(edge: EdgeRecord): void {
    this.requireVertex(edge.from);
    this.requireVertex(edge.to);
    this.edges.push(edge);
    this.edgeIdentities.add(edgeIdentity(edge));
  }

  hasEdge(label: EdgeLabel, from: string, to: string): boolean {
    return this.edgeIdentities.has(edgeIdentity({ label, from, to }));
  }

  /** Adds the edge unless one with the same label and endpoints is staged. */
  addEdgeIfAbsent(edge: EdgeRecord): boolean {
    if (this.hasEdge(edge.label, edge.from, edge.to)) {
      return false;
    }
    this.addEdge(edge);
    return true;
  }

  edgesWithLabel<L extends EdgeLabel>(label: L): Extract<EdgeRecord, { label: L }>[] {
    return this.edges.filter((edge): edge is Extract<EdgeRecord, { label: L }> => edge.label === label);
  }

  build(): SnapshotDelta {
    return Object.freeze({
      scope: Object.freeze({ ...this.scope }),
      vertices: Object.freeze([...this.vertices.values()]),
      edges: Object.freeze([...this.edges])
    });
  }
}
