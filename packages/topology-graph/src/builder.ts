import type { Logger } from '@topograph/shared';
import { silentLogger } from '@topograph/shared';
import type { PlanSource } from '@topograph/tracker-client';
import type { EdgeLabel, LabelCounts, SnapshotScope, VertexLabel } from './model';
import { brokerMeshPolicy } from './physicalPaths';
import type { RoutingPolicy } from './physicalPaths';
import { planSnapshot } from './steps';
import type { GraphStore } from './store/types';

export type TopologyGraphBuilderOptions = {
  planSource: PlanSource;
  store: GraphStore;
  routingPolicy?: RoutingPolicy;
  logger?: Logger;
};

export type BuildSnapshotInput = SnapshotScope & {
  cluster: string;
  environ: string;
};

export type SnapshotBuildSummary = BuildSnapshotInput & {
  removedVertices: number;
  vertices: LabelCounts<VertexLabel>;
  edges: LabelCounts<EdgeLabel>;
  durationMs: number;
};

/**
 * Fetches the plans of a running topology and writes them to the graph
 * store as one snapshot. The store connection is shared by every build.
 */
export class TopologyGraphBuilder {
  private readonly planSource: PlanSource;
  private readonly store: GraphStore;
  private readonly routingPolicy: RoutingPolicy;
  private readonly logger: Logger;

  constructor(options: TopologyGraphBuilderOptions) {
    this.planSource = options.planSource;
    this.store = options.store;
    this.routingPolicy = options.routingPolicy ?? brokerMeshPolicy;
    this.logger = options.logger ?? silentLogger;
  }

  async buildSnapshot(input: BuildSnapshotInput): Promise<SnapshotBuildSummary> {
    const { topologyId, snapshotRef, cluster, environ } = input;
    const startedAt = Date.now();
    const log = this.logger.child({ topologyId, snapshotRef });
    log.info({ cluster, environ }, 'building topology snapshot');

    try {
      const logicalPlan = await this.planSource.getLogicalPlan(cluster, environ, topologyId);
      const physicalPlan = await this.planSource.getPhysicalPlan(cluster, environ, topologyId);

      const delta = planSnapshot({ topologyId, snapshotRef }, logicalPlan, physicalPlan, {
        routingPolicy: this.routingPolicy,
        logger: log
      });
      const written = await this.store.replaceSnapshot(delta);

      const summary: SnapshotBuildSummary = {
        topologyId,
        snapshotRef,
        cluster,
        environ,
        removedVertices: written.removedVertices,
        vertices: written.vertices,
        edges: written.edges,
        durationMs: Date.now() - startedAt
      };
      log.info(
        { vertices: summary.vertices, edges: summary.edges, removedVertices: summary.removedVertices },
        'topology snapshot written'
      );
      return summary;
    } catch (err) {
      log.error({ err }, 'topology snapshot build failed');
      throw err;
    }
  }

  async close(): Promise<void> {
    await this.store.close();
  }
}
