import type { Logger } from '@topograph/shared';
import { TrackerClient } from '@topograph/tracker-client';
import { TopologyGraphBuilder } from './builder';
import type { TopologyGraphConfig } from './config';
import { resolveRoutingPolicy } from './physicalPaths';
import { createNeo4jGraphStore } from './store/neo4jStore';
import type { GraphStore } from './store/types';

export function createGraphStore(config: TopologyGraphConfig, logger: Logger): GraphStore {
  logger.info({ url: config.graphDb.url, database: config.graphDb.database }, 'connecting to graph database');
  return createNeo4jGraphStore({ ...config.graphDb, logger: logger.child({ component: 'graph-store' }) });
}

export function createTopologyGraphBuilder(config: TopologyGraphConfig, logger: Logger): TopologyGraphBuilder {
  return new TopologyGraphBuilder({
    planSource: new TrackerClient({
      baseUrl: config.trackerUrl,
      fetchTimeoutMs: config.trackerTimeoutMs,
      userAgent: 'topograph'
    }),
    store: createGraphStore(config, logger),
    routingPolicy: resolveRoutingPolicy(config.routingPolicy),
    logger
  });
}
