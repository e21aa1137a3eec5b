import neo4j, { isInt } from 'neo4j-driver';
import type { Integer, Record as Neo4jRecord } from 'neo4j-driver';
import type { Logger } from '@topograph/shared';
import { silentLogger } from '@topograph/shared';
import { GraphStoreError } from '../errors';
import { EDGE_LABELS, VERTEX_LABELS, countEdges, countVertices } from '../model';
import type {
  EdgeLabel,
  EdgeRecord,
  PropertyMap,
  PropertyValue,
  SnapshotDelta,
  SnapshotScope,
  VertexLabel,
  VertexRecord
} from '../model';
import type { EdgeHandle, EdgeQuery, GraphStore, SnapshotWriteResult, VertexHandle, VertexQuery } from './types';

/** The subset of the neo4j-driver API the store relies on. */
export interface Neo4jTransaction {
  run(cypher: string, parameters?: Record<string, unknown>): PromiseLike<{ records: Neo4jRecord[] }>;
}

export interface Neo4jSession {
  executeRead<T>(work: (tx: Neo4jTransaction) => Promise<T>): Promise<T>;
  executeWrite<T>(work: (tx: Neo4jTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export interface Neo4jDriver {
  session(config: { database?: string; defaultAccessMode: 'READ' | 'WRITE' }): Neo4jSession;
  close(): Promise<void>;
}

export type Neo4jGraphStoreConfig = {
  /** Driver used for every session. */
  driver: Neo4jDriver;

  /** Database name; the server default when omitted. */
  database?: string;

  /** Close the driver when the store is closed. */
  ownsDriver?: boolean;

  logger?: Logger;
};

export type Neo4jConnectionOptions = {
  url: string;
  user?: string;
  password?: string;
  database?: string;
  logger?: Logger;
};

type Neo4jParameter = string | number | boolean | Integer;

const VERTEX_COLUMNS = 'elementId(n) AS id, labels(n) AS labels, properties(n) AS properties';
const EDGE_COLUMNS =
  'elementId(r) AS id, type(r) AS label, elementId(a) AS source, elementId(b) AS target, properties(r) AS properties';

// Integral numbers are written as Neo4j integers so that container and task ids stay integers.
function toNeo4jProperties(properties: PropertyMap): Record<string, Neo4jParameter> {
  const out: Record<string, Neo4jParameter> = {};
  for (const [key, value] of Object.entries(properties)) {
    out[key] = typeof value === 'number' && Number.isInteger(value) ? neo4j.int(value) : value;
  }
  return out;
}

function toPropertyValue(value: unknown): PropertyValue | undefined {
  if (isInt(value)) {
    return value.inSafeRange() ? value.toNumber() : value.toString();
  }
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  return undefined;
}

function readString(record: Neo4jRecord, key: string): string {
  const value: unknown = record.get(key);
  if (typeof value !== 'string') {
    throw new Error(`expected column ${key} to be a string`);
  }
  return value;
}

function readNumber(record: Neo4jRecord, key: string): number {
  const value = toPropertyValue(record.get(key));
  if (typeof value !== 'number') {
    throw new Error(`expected column ${key} to be a number`);
  }
  return value;
}

function readProperties(record: Neo4jRecord): PropertyMap {
  const raw: unknown = record.get('properties');
  const properties: PropertyMap = {};
  if (!raw || typeof raw !== 'object') {
    return properties;
  }
  for (const [key, value] of Object.entries(raw)) {
    const converted = toPropertyValue(value);
    if (converted !== undefined) {
      properties[key] = converted;
    }
  }
  return properties;
}

function readVertexLabel(record: Neo4jRecord): VertexLabel {
  const labels: unknown = record.get('labels');
  if (Array.isArray(labels)) {
    const label = VERTEX_LABELS.find((candidate) => labels.includes(candidate));
    if (label) {
      return label;
    }
  }
  throw new Error(`vertex ${readString(record, 'id')} carries no topology label`);
}

function readEdgeLabel(record: Neo4jRecord): EdgeLabel {
  const type = readString(record, 'label');
  const label = EDGE_LABELS.find((candidate) => candidate === type);
  if (!label) {
    throw new Error(`edge ${readString(record, 'id')} has unexpected type ${type}`);
  }
  return label;
}

function toVertexHandle(record: Neo4jRecord): VertexHandle {
  return { id: readString(record, 'id'), label: readVertexLabel(record), properties: readProperties(record) };
}

function toEdgeHandle(record: Neo4jRecord): EdgeHandle {
  return {
    id: readString(record, 'id'),
    label: readEdgeLabel(record),
    from: readString(record, 'source'),
    to: readString(record, 'target'),
    properties: readProperties(record)
  };
}

function groupBy<T, K extends string>(items: readonly T[], keyOf: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

/**
 * GraphStore backed by Neo4j. Labels and relationship types come from the
 * closed label unions, so they are interpolated; every value is a parameter.
 */
export class Neo4jGraphStore implements GraphStore {
  private readonly driver: Neo4jDriver;
  private readonly database?: string;
  private readonly ownsDriver: boolean;
  private readonly logger: Logger;

  constructor(config: Neo4jGraphStoreConfig) {
    this.driver = config.driver;
    this.database = config.database;
    this.ownsDriver = config.ownsDriver ?? false;
    this.logger = config.logger ?? silentLogger;
  }

  async addVertex(label: VertexLabel, properties: PropertyMap): Promise<VertexHandle> {
    const [record] = await this.write('addVertex', (tx) =>
      this.runQuery(tx, `CREATE (n:${label}) SET n = $properties RETURN ${VERTEX_COLUMNS}`, {
        properties: toNeo4jProperties(properties)
      })
    );
    if (!record) {
      throw new GraphStoreError('addVertex', new Error('CREATE returned no vertex'));
    }
    return this.convert('addVertex', () => toVertexHandle(record));
  }

  async addEdge(from: VertexHandle, label: EdgeLabel, to: VertexHandle, properties: PropertyMap): Promise<EdgeHandle> {
    const cypher = `
      MATCH (a) WHERE elementId(a) = $from
      MATCH (b) WHERE elementId(b) = $to
      CREATE (a)-[r:${label}]->(b)
      SET r = $properties
      RETURN ${EDGE_COLUMNS}
    `.trim();
    const [record] = await this.write('addEdge', (tx) =>
      this.runQuery(tx, cypher, { from: from.id, to: to.id, properties: toNeo4jProperties(properties) })
    );
    if (!record) {
      throw new GraphStoreError('addEdge', new Error(`vertex ${from.id} or ${to.id} does not exist`));
    }
    return this.convert('addEdge', () => toEdgeHandle(record));
  }

  async findVertices(query: VertexQuery): Promise<VertexHandle[]> {
    const labels = query.label === undefined ? null : typeof query.label === 'string' ? [query.label] : [...query.label];
    const cypher = `
      MATCH (n)
      WHERE ($labels IS NULL OR any(l IN labels(n) WHERE l IN $labels))
        AND all(k IN keys($where) WHERE n[k] = $where[k])
      RETURN ${VERTEX_COLUMNS}
      ORDER BY id
    `.trim();
    const records = await this.read('findVertices', (tx) =>
      this.runQuery(tx, cypher, { labels, where: toNeo4jProperties(query.where ?? {}) })
    );
    return this.convert('findVertices', () => records.map(toVertexHandle));
  }

  async findEdges(query: EdgeQuery): Promise<EdgeHandle[]> {
    const cypher = `
      MATCH (a)-[r]->(b)
      WHERE ($label IS NULL OR type(r) = $label)
        AND all(k IN keys($where) WHERE r[k] = $where[k])
      RETURN ${EDGE_COLUMNS}
      ORDER BY id
    `.trim();
    const records = await this.read('findEdges', (tx) =>
      this.runQuery(tx, cypher, { label: query.label ?? null, where: toNeo4jProperties(query.where ?? {}) })
    );
    return this.convert('findEdges', () => records.map(toEdgeHandle));
  }

  async replaceSnapshot(delta: SnapshotDelta): Promise<SnapshotWriteResult> {
    const removedVertices = await this.write('replaceSnapshot', async (tx) => {
      const removed = await this.deleteScope(tx, delta.scope);
      const ids = await this.createVertices(tx, delta.vertices);
      await this.createEdges(tx, delta.edges, ids);
      return removed;
    });

    this.logger.debug(
      { ...delta.scope, removedVertices, vertices: delta.vertices.length, edges: delta.edges.length },
      'replaced snapshot in neo4j'
    );
    return { removedVertices, vertices: countVertices(delta.vertices), edges: countEdges(delta.edges) };
  }

  async dropSnapshot(scope: SnapshotScope): Promise<number> {
    return this.write('dropSnapshot', (tx) => this.deleteScope(tx, scope));
  }

  async close(): Promise<void> {
    if (this.ownsDriver) {
      await this.driver.close();
    }
  }

  private async deleteScope(tx: Neo4jTransaction, scope: SnapshotScope): Promise<number> {
    const [record] = await this.runQuery(
      tx,
      `MATCH (n {topologyId: $topologyId, snapshotRef: $snapshotRef}) DETACH DELETE n RETURN count(*) AS removed`,
      { topologyId: scope.topologyId, snapshotRef: scope.snapshotRef }
    );
    return record ? readNumber(record, 'removed') : 0;
  }

  private async createVertices(tx: Neo4jTransaction, vertices: readonly VertexRecord[]): Promise<Map<string, string>> {
    const ids = new Map<string, string>();
    for (const [label, group] of groupBy(vertices, (vertex) => vertex.label)) {
      const rows = group.map((vertex) => ({ key: vertex.key, properties: toNeo4jProperties(vertex.properties) }));
      const records = await this.runQuery(
        tx,
        `UNWIND $rows AS row CREATE (n:${label}) SET n = row.properties RETURN row.key AS key, elementId(n) AS id`,
        { rows }
      );
      for (const record of records) {
        ids.set(readString(record, 'key'), readString(record, 'id'));
      }
    }
    return ids;
  }

  private async createEdges(
    tx: Neo4jTransaction,
    edges: readonly EdgeRecord[],
    ids: Map<string, string>
  ): Promise<void> {
    for (const [label, group] of groupBy(edges, (edge) => edge.label)) {
      const rows = group.map((edge) => {
        const from = ids.get(edge.from);
        const to = ids.get(edge.to);
        if (from === undefined || to === undefined) {
          throw new Error(`edge ${label} ${edge.from} -> ${edge.to} references a vertex outside the snapshot`);
        }
        return { from, to, properties: toNeo4jProperties(edge.properties) };
      });
      const cypher = `
        UNWIND $rows AS row
        MATCH (a) WHERE elementId(a) = row.from
        MATCH (b) WHERE elementId(b) = row.to
        CREATE (a)-[r:${label}]->(b)
        SET r = row.properties
        RETURN count(r) AS created
      `.trim();
      const [record] = await this.runQuery(tx, cypher, { rows });
      const created = record ? readNumber(record, 'created') : 0;
      if (created !== rows.length) {
        throw new Error(`created ${created} of ${rows.length} ${label} edges`);
      }
    }
  }

  private async runQuery(
    tx: Neo4jTransaction,
    cypher: string,
    parameters: Record<string, unknown>
  ): Promise<Neo4jRecord[]> {
    const result = await tx.run(cypher, parameters);
    return result.records;
  }

  private session(mode: 'READ' | 'WRITE'): Neo4jSession {
    return this.driver.session({
      database: this.database,
      defaultAccessMode: mode === 'READ' ? neo4j.session.READ : neo4j.session.WRITE
    });
  }

  private async read<T>(operation: string, work: (tx: Neo4jTransaction) => Promise<T>): Promise<T> {
    const session = this.session('READ');
    try {
      return await session.executeRead(work);
    } catch (err) {
      throw this.wrap(operation, err);
    } finally {
      await session.close();
    }
  }

  private async write<T>(operation: string, work: (tx: Neo4jTransaction) => Promise<T>): Promise<T> {
    const session = this.session('WRITE');
    try {
      return await session.executeWrite(work);
    } catch (err) {
      throw this.wrap(operation, err);
    } finally {
      await session.close();
    }
  }

  private convert<T>(operation: string, work: () => T): T {
    try {
      return work();
    } catch (err) {
      throw this.wrap(operation, err);
    }
  }

  private wrap(operation: string, err: unknown): GraphStoreError {
    if (err instanceof GraphStoreError) {
      return err;
    }
    this.logger.error({ err, operation }, 'graph store operation failed');
    return new GraphStoreError(operation, err);
  }
}

/** Opens a driver that the returned store owns and closes. */
export function createNeo4jGraphStore(options: Neo4jConnectionOptions): Neo4jGraphStore {
  const auth =
    options.user !== undefined && options.password !== undefined
      ? neo4j.auth.basic(options.user, options.password)
      : undefined;
  const driver = neo4j.driver(options.url, auth);
  return new Neo4jGraphStore({ driver, database: options.database, ownsDriver: true, logger: options.logger });
}
