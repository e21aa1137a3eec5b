import { GraphStoreError } from '../errors';
import { matchesLabel, matchesProperties } from '../delta';
import { countEdges, countVertices } from '../model';
import type { EdgeLabel, PropertyMap, SnapshotDelta, SnapshotScope, VertexLabel } from '../model';
import type { EdgeHandle, EdgeQuery, GraphStore, SnapshotWriteResult, VertexHandle, VertexQuery } from './types';

type GraphState = {
  vertices: Map<string, VertexHandle>;
  edges: Map<string, EdgeHandle>;
};

const cloneVertex = (vertex: VertexHandle): VertexHandle => ({ ...vertex, properties: { ...vertex.properties } });
const cloneEdge = (edge: EdgeHandle): EdgeHandle => ({ ...edge, properties: { ...edge.properties } });

/**
 * In-process GraphStore. Snapshot replacement is staged on a copy of the
 * graph and swapped in only once every record has been written.
 */
export class MemoryGraphStore implements GraphStore {
  private state: GraphState = { vertices: new Map(), edges: new Map() };
  private sequence = 0;
  private closed = false;

  async addVertex(label: VertexLabel, properties: PropertyMap): Promise<VertexHandle> {
    this.ensureOpen('addVertex');
    return cloneVertex(this.insertVertex(this.state, label, properties));
  }

  async addEdge(from: VertexHandle, label: EdgeLabel, to: VertexHandle, properties: PropertyMap): Promise<EdgeHandle> {
    this.ensureOpen('addEdge');
    return cloneEdge(this.insertEdge(this.state, from.id, label, to.id, properties, 'addEdge'));
  }

  async findVertices(query: VertexQuery): Promise<VertexHandle[]> {
    this.ensureOpen('findVertices');
    const matches: VertexHandle[] = [];
    for (const vertex of this.state.vertices.values()) {
      if (matchesLabel(vertex.label, query.label) && matchesProperties(vertex.properties, query.where)) {
        matches.push(cloneVertex(vertex));
      }
    }
    return matches;
  }

  async findEdges(query: EdgeQuery): Promise<EdgeHandle[]> {
    this.ensureOpen('findEdges');
    const matches: EdgeHandle[] = [];
    for (const edge of this.state.edges.values()) {
      if ((query.label === undefined || edge.label === query.label) && matchesProperties(edge.properties, query.where)) {
        matches.push(cloneEdge(edge));
      }
    }
    return matches;
  }

  async replaceSnapshot(delta: SnapshotDelta): Promise<SnapshotWriteResult> {
    this.ensureOpen('replaceSnapshot');
    const staged: GraphState = { vertices: new Map(this.state.vertices), edges: new Map(this.state.edges) };
    const removedVertices = this.removeScope(staged, delta.scope);

    const ids = new Map<string, string>();
    for (const vertex of delta.vertices) {
      ids.set(vertex.key, this.insertVertex(staged, vertex.label, vertex.properties).id);
    }
    for (const edge of delta.edges) {
      const from = ids.get(edge.from);
      const to = ids.get(edge.to);
      if (from === undefined || to === undefined) {
        throw new GraphStoreError(
          'replaceSnapshot',
          new Error(`edge ${edge.label} ${edge.from} -> ${edge.to} references a vertex outside the snapshot`)
        );
      }
      this.insertEdge(staged, from, edge.label, to, edge.properties, 'replaceSnapshot');
    }

    this.state = staged;
    return {
      removedVertices,
      vertices: countVertices(delta.vertices),
      edges: countEdges(delta.edges)
    };
  }

  async dropSnapshot(scope: SnapshotScope): Promise<number> {
    this.ensureOpen('dropSnapshot');
    return this.removeScope(this.state, scope);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private ensureOpen(operation: string): void {
    if (this.closed) {
      throw new GraphStoreError(operation, new Error('store is closed'));
    }
  }

  private nextId(prefix: string): string {
    this.sequence += 1;
    return `${prefix}${this.sequence}`;
  }

  private insertVertex(state: GraphState, label: VertexLabel, properties: PropertyMap): VertexHandle {
    const vertex: VertexHandle = { id: this.nextId('v'), label, properties: { ...properties } };
    state.vertices.set(vertex.id, vertex);
    return vertex;
  }

  private insertEdge(
    state: GraphState,
    from: string,
    label: EdgeLabel,
    to: string,
    properties: PropertyMap,
    operation: string
  ): EdgeHandle {
    if (!state.vertices.has(from) || !state.vertices.has(to)) {
      throw new GraphStoreError(operation, new Error(`edge ${label} ${from} -> ${to} references an unknown vertex`));
    }
    const edge: EdgeHandle = { id: this.nextId('e'), label, from, to, properties: { ...properties } };
    state.edges.set(edge.id, edge);
    return edge;
  }

  private removeScope(state: GraphState, scope: SnapshotScope): number {
    const removed = new Set<string>();
    for (const vertex of state.vertices.values()) {
      if (vertex.properties.topologyId === scope.topologyId && vertex.properties.snapshotRef === scope.snapshotRef) {
        removed.add(vertex.id);
      }
    }
    for (const id of removed) {
      state.vertices.delete(id);
    }
    for (const edge of [...state.edges.values()]) {
      if (removed.has(edge.from) || removed.has(edge.to)) {
        state.edges.delete(edge.id);
      }
    }
    return removed.size;
  }
}
