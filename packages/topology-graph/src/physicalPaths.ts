import { brokerKey } from './model';
import type { InstanceVertexRecord } from './model';

export const ROUTING_POLICIES = ['broker-mesh', 'same-broker'] as const;

export type RoutingPolicyName = (typeof ROUTING_POLICIES)[number];

/**
 * Returns the vertex keys a message travels through from `source` to
 * `destination`, both ends included, or null when the pair is not routable.
 */
export type RoutingPolicy = (source: InstanceVertexRecord, destination: InstanceVertexRecord) => string[] | null;

// Every broker can reach every other broker.
export const brokerMeshPolicy: RoutingPolicy = (source, destination) => {
  const sourceBroker = source.properties.brokerId;
  const destinationBroker = destination.properties.brokerId;
  const path = [source.key, brokerKey(sourceBroker)];
  if (destinationBroker !== sourceBroker) {
    path.push(brokerKey(destinationBroker));
  }
  path.push(destination.key);
  return path;
};

export const sameBrokerPolicy: RoutingPolicy = (source, destination) => {
  if (source.properties.brokerId !== destination.properties.brokerId) {
    return null;
  }
  return [source.key, brokerKey(source.properties.brokerId), destination.key];
};

export function resolveRoutingPolicy(name: RoutingPolicyName): RoutingPolicy {
  switch (name) {
    case 'broker-mesh':
      return brokerMeshPolicy;
    case 'same-broker':
      return sameBrokerPolicy;
  }
}
