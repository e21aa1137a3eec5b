import type { Logger } from '@topograph/shared';
import { silentLogger } from '@topograph/shared';
import type { LogicalPlan, PhysicalPlan } from '@topograph/tracker-client';
import { SnapshotDeltaBuilder } from './delta';
import { LookupError, ParseError } from './errors';
import { parseBrokerContainer, parseInstanceName } from './instanceNames';
import {
  INSTANCE_LABELS,
  brokerKey,
  containerKey,
  instanceKey,
  isInstanceVertex
} from './model';
import type { InstanceVertexRecord, SnapshotDelta, SnapshotScope, VertexRecord } from './model';
import { brokerMeshPolicy } from './physicalPaths';
import type { RoutingPolicy } from './physicalPaths';

export type StepContext = {
  delta: SnapshotDeltaBuilder;
  logger: Logger;
};

type Placement = {
  container: number;
  taskId: number;
  brokerId: string;
};

function resolveInstances(
  instancesByComponent: Record<string, string[]>,
  component: string,
  kind: 'spout' | 'bolt'
): string[] {
  const instances: string[] | undefined = instancesByComponent[component];
  if (!instances) {
    throw new LookupError(`Physical plan lists no instances for ${kind} component ${component}`);
  }
  return instances;
}

function resolvePlacement(physicalPlan: PhysicalPlan, instanceName: string): Placement {
  const parsed = parseInstanceName(instanceName);
  const assignment: PhysicalPlan['instances'][string] | undefined = physicalPlan.instances[instanceName];
  if (!assignment) {
    throw new LookupError(`Physical plan has no broker assignment for instance ${instanceName}`);
  }
  if (!physicalPlan.brokers[assignment.brokerId]) {
    throw new LookupError(`Instance ${instanceName} is assigned to unknown broker ${assignment.brokerId}`);
  }
  return { container: parsed.container, taskId: parsed.taskId, brokerId: assignment.brokerId };
}

function linkToContainer({ delta }: StepContext, instance: VertexRecord, container: number): void {
  const target = delta.getVertex(containerKey(container));
  if (!target) {
    throw new LookupError(
      `Container ${container} for ${instance.key} is missing from snapshot ${delta.scope.topologyId}/${delta.scope.snapshotRef}`
    );
  }
  delta.addEdge({ label: 'IS_WITHIN', from: instance.key, to: target.key, properties: { ...delta.scope } });
}

function groupInstancesByComponent(delta: SnapshotDeltaBuilder): Map<string, InstanceVertexRecord[]> {
  const groups = new Map<string, InstanceVertexRecord[]>();
  for (const vertex of delta.findVertices({ label: INSTANCE_LABELS })) {
    if (!isInstanceVertex(vertex)) {
      continue;
    }
    const group = groups.get(vertex.properties.component);
    if (group) {
      group.push(vertex);
    } else {
      groups.set(vertex.properties.component, [vertex]);
    }
  }
  return groups;
}

export function createBrokersAndContainers(context: StepContext, physicalPlan: PhysicalPlan): void {
  const { delta, logger } = context;
  logger.info({ brokers: Object.keys(physicalPlan.brokers).length }, 'creating broker and container vertices');

  const owners = new Map<number, string>();
  for (const broker of Object.values(physicalPlan.brokers)) {
    const container = parseBrokerContainer(broker.id);
    const owner = owners.get(container);
    if (owner !== undefined) {
      throw new ParseError(broker.id, `container ${container} is already claimed by broker ${owner}`);
    }
    owners.set(container, broker.id);
    logger.debug({ brokerId: broker.id, container }, 'creating broker vertex');

    delta.addVertex({
      key: brokerKey(broker.id),
      label: 'Broker',
      properties: {
        id: broker.id,
        host: broker.host,
        port: broker.port,
        shellPort: broker.shellPort,
        ...delta.scope
      }
    });
    delta.addVertex({
      key: containerKey(container),
      label: 'Container',
      properties: { id: container, ...delta.scope }
    });
    delta.addEdge({
      label: 'IS_WITHIN',
      from: brokerKey(broker.id),
      to: containerKey(container),
      properties: { ...delta.scope }
    });
  }
}

export function createSpouts(context: StepContext, physicalPlan: PhysicalPlan, logicalPlan: LogicalPlan): void {
  const { delta, logger } = context;

  for (const [component, spout] of Object.entries(logicalPlan.spouts)) {
    logger.debug({ component }, 'creating vertices for spout instances');
    for (const instanceName of resolveInstances(physicalPlan.spouts, component, 'spout')) {
      const placement = resolvePlacement(physicalPlan, instanceName);
      const vertex = delta.addVertex({
        key: instanceKey(instanceName),
        label: 'Spout',
        properties: {
          container: placement.container,
          taskId: placement.taskId,
          component,
          brokerId: placement.brokerId,
          spoutType: spout.spoutType,
          spoutSource: spout.spoutSource,
          ...delta.scope
        }
      });
      linkToContainer(context, vertex, placement.container);
    }
  }
}

export function createBolts(context: StepContext, physicalPlan: PhysicalPlan, logicalPlan: LogicalPlan): void {
  const { delta, logger } = context;

  for (const component of Object.keys(logicalPlan.bolts)) {
    logger.debug({ component }, 'creating vertices for bolt instances');
    for (const instanceName of resolveInstances(physicalPlan.bolts, component, 'bolt')) {
      const placement = resolvePlacement(physicalPlan, instanceName);
      const vertex = delta.addVertex({
        key: instanceKey(instanceName),
        label: 'Bolt',
        properties: {
          container: placement.container,
          taskId: placement.taskId,
          component,
          brokerId: placement.brokerId,
          ...delta.scope
        }
      });
      linkToContainer(context, vertex, placement.container);
    }
  }
}

/**
 * Connects every instance of each declared source component to every
 * instance of the consuming bolt, once per input stream.
 */
export function createLogicalEdges(context: StepContext, logicalPlan: LogicalPlan): void {
  const { delta, logger } = context;
  logger.info({ topologyId: delta.scope.topologyId }, 'adding logical connections between instances');
  const instances = groupInstancesByComponent(delta);

  for (const [component, bolt] of Object.entries(logicalPlan.bolts)) {
    const destinations = instances.get(component) ?? [];

    for (const input of bolt.inputs) {
      const sources = instances.get(input.componentName) ?? [];
      logger.debug(
        {
          component,
          source: input.componentName,
          stream: input.streamName,
          edges: sources.length * destinations.length
        },
        'adding logical connections for input stream'
      );

      for (const destination of destinations) {
        for (const source of sources) {
          delta.addEdge({
            label: 'LOGICALLY_CONNECTED',
            from: source.key,
            to: destination.key,
            properties: { streamName: input.streamName, grouping: input.grouping, ...delta.scope }
          });
        }
      }
    }
  }
}

export function createDataFlowPaths(context: StepContext, policy: RoutingPolicy): void {
  const { delta, logger } = context;
  let added = 0;

  for (const edge of delta.edgesWithLabel('LOGICALLY_CONNECTED')) {
    const source = delta.requireVertex(edge.from);
    const destination = delta.requireVertex(edge.to);
    if (!isInstanceVertex(source) || !isInstanceVertex(destination)) {
      throw new LookupError(`Logical connection ${edge.from} -> ${edge.to} does not join two instances`);
    }

    const path = policy(source, destination);
    if (!path) {
      continue;
    }
    for (let index = 1; index < path.length; index += 1) {
      const inserted = delta.addEdgeIfAbsent({
        label: 'PHYSICALLY_CONNECTED',
        from: path[index - 1],
        to: path[index],
        properties: { ...delta.scope }
      });
      if (inserted) {
        added += 1;
      }
    }
  }

  logger.info({ edges: added }, 'added physical connections');
}

export type PlanSnapshotOptions = {
  routingPolicy?: RoutingPolicy;
  logger?: Logger;
};

/** Computes every vertex and edge of a snapshot without touching a store. */
export function planSnapshot(
  scope: SnapshotScope,
  logicalPlan: LogicalPlan,
  physicalPlan: PhysicalPlan,
  options: PlanSnapshotOptions = {}
): SnapshotDelta {
  const context: StepContext = {
    delta: new SnapshotDeltaBuilder(scope),
    logger: options.logger ?? silentLogger
  };

  createBrokersAndContainers(context, physicalPlan);
  createSpouts(context, physicalPlan, logicalPlan);
  createBolts(context, physicalPlan, logicalPlan);
  createLogicalEdges(context, logicalPlan);
  createDataFlowPaths(context, options.routingPolicy ?? brokerMeshPolicy);

  return context.delta.build();
}
