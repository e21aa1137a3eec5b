export * from './model';
export * from './errors';
export { parseBrokerContainer, parseInstanceName } from './instanceNames';
export type { ParsedInstanceName } from './instanceNames';
export { SnapshotDeltaBuilder } from './delta';
export type { VertexPredicate } from './delta';
export {
  createBolts,
  createBrokersAndContainers,
  createDataFlowPaths,
  createLogicalEdges,
  createSpouts,
  planSnapshot
} from './steps';
export type { PlanSnapshotOptions, StepContext } from './steps';
export {
  ROUTING_POLICIES,
  brokerMeshPolicy,
  resolveRoutingPolicy,
  sameBrokerPolicy
} from './physicalPaths';
export type { RoutingPolicy, RoutingPolicyName } from './physicalPaths';
export { TopologyGraphBuilder } from './builder';
export type { BuildSnapshotInput, SnapshotBuildSummary, TopologyGraphBuilderOptions } from './builder';
export { loadTopologyGraphConfig } from './config';
export type { TopologyGraphConfig } from './config';
export { createGraphStore, createTopologyGraphBuilder } from './factory';
export { MemoryGraphStore } from './store/memoryStore';
export { Neo4jGraphStore, createNeo4jGraphStore } from './store/neo4jStore';
export type {
  Neo4jConnectionOptions,
  Neo4jDriver,
  Neo4jGraphStoreConfig,
  Neo4jSession,
  Neo4jTransaction
} from './store/neo4jStore';
export { scopeFilter } from './store/types';
export type {
  EdgeHandle,
  EdgeQuery,
  GraphStore,
  SnapshotWriteResult,
  VertexHandle,
  VertexQuery
} from './store/types';
