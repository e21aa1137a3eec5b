import { silentLogger } from '@topograph/shared';
import type { TopologyMetricsClient } from '@topograph/metrics';
import { MemoryGraphStore, TopologyGraphBuilder } from '@topograph/topology-graph';
import type {
  EdgeHandle,
  EdgeQuery,
  GraphStore,
  SnapshotDelta,
  SnapshotScope,
  SnapshotWriteResult,
  VertexHandle,
  VertexQuery
} from '@topograph/topology-graph';
import type { LogicalPlan, PhysicalPlan, PlanSource } from '@topograph/tracker-client';
import type { CliContext } from '../src';

export const testEnv = {
  TOPOGRAPH_TRACKER_URL: 'http://tracker.test',
  TOPOGRAPH_GRAPH_DB_URL: 'bolt://graph.test:7687'
};

export const logicalPlan: LogicalPlan = {
  spouts: { word: { spoutType: 'kafka', spoutSource: 'words-topic', outputs: ['default'] } },
  bolts: {
    count: { inputs: [{ componentName: 'word', streamName: 'default', grouping: 'SHUFFLE' }], outputs: [] }
  }
};

export const physicalPlan: PhysicalPlan = {
  brokers: { 'stmgr-1': { id: 'stmgr-1', host: 'node-a.local', port: 6001, shellPort: 6002 } },
  spouts: { word: ['container_1_word_1', 'container_1_word_2'] },
  bolts: { count: ['container_1_count_3'] },
  instances: {
    container_1_word_1: { brokerId: 'stmgr-1' },
    container_1_word_2: { brokerId: 'stmgr-1' },
    container_1_count_3: { brokerId: 'stmgr-1' }
  }
};

export class StaticPlanSource implements PlanSource {
  constructor(
    private readonly logical: LogicalPlan,
    private readonly physical: PhysicalPlan
  ) {}

  async getLogicalPlan(): Promise<LogicalPlan> {
    return this.logical;
  }

  async getPhysicalPlan(): Promise<PhysicalPlan> {
    return this.physical;
  }
}

/** Shares one in-memory graph across commands; close only counts calls. */
export class SharedGraphStore implements GraphStore {
  readonly graph = new MemoryGraphStore();
  closeCalls = 0;

  addVertex(label: VertexHandle['label'], properties: VertexHandle['properties']): Promise<VertexHandle> {
    return this.graph.addVertex(label, properties);
  }

  addEdge(
    from: VertexHandle,
    label: EdgeHandle['label'],
    to: VertexHandle,
    properties: EdgeHandle['properties']
  ): Promise<EdgeHandle> {
    return this.graph.addEdge(from, label, to, properties);
  }

  findVertices(query: VertexQuery): Promise<VertexHandle[]> {
    return this.graph.findVertices(query);
  }

  findEdges(query: EdgeQuery): Promise<EdgeHandle[]> {
    return this.graph.findEdges(query);
  }

  replaceSnapshot(delta: SnapshotDelta): Promise<SnapshotWriteResult> {
    return this.graph.replaceSnapshot(delta);
  }

  dropSnapshot(scope: SnapshotScope): Promise<number> {
    return this.graph.dropSnapshot(scope);
  }

  async close(): Promise<void> {
    this.closeCalls += 1;
  }
}

export type TestHarness = {
  context: CliContext;
  store: SharedGraphStore;
  stdout: string[];
  stderr: string[];
  exitCode(): number | undefined;
};

export type TestHarnessOptions = {
  env?: Record<string, string | undefined>;
  planSource?: PlanSource;
  metricsClient?: TopologyMetricsClient;
};

export function createHarness(options: TestHarnessOptions = {}): TestHarness {
  const store = new SharedGraphStore();
  const stdout: string[] = [];
  const stderr: string[] = [];
  let exitCode: number | undefined;
  const planSource = options.planSource ?? new StaticPlanSource(logicalPlan, physicalPlan);

  const context: CliContext = {
    env: options.env ?? testEnv,
    stdout: (line) => stdout.push(line),
    stderr: (line) => stderr.push(line),
    setExitCode: (code) => {
      exitCode = code;
    },
    createLogger: () => silentLogger,
    createBuilder: (_config, logger) => new TopologyGraphBuilder({ planSource, store, logger }),
    createStore: () => store,
    createMetricsClient: () => {
      if (!options.metricsClient) {
        throw new Error('no metrics client configured for this test');
      }
      return options.metricsClient;
    }
  };

  return { context, store, stdout, stderr, exitCode: () => exitCode };
}
