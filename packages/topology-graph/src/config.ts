import { z } from 'zod';
import { enumVar, integerVar, loadEnvConfig, stringVar, urlVar } from '@topograph/shared';
import type { EnvSource } from '@topograph/shared';
import { ROUTING_POLICIES } from './physicalPaths';
import type { RoutingPolicyName } from './physicalPaths';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const NEO4J_PROTOCOLS = ['bolt', 'bolt+s', 'bolt+ssc', 'neo4j', 'neo4j+s', 'neo4j+ssc'];

export type TopologyGraphConfig = {
  trackerUrl: string;
  trackerTimeoutMs: number;
  graphDb: {
    url: string;
    user?: string;
    password?: string;
    database?: string;
  };
  routingPolicy: RoutingPolicyName;
  logLevel: (typeof LOG_LEVELS)[number];
};

const envSchema = z
  .object({
    TOPOGRAPH_TRACKER_URL: urlVar({ required: true, protocols: ['http', 'https'] }),
    TOPOGRAPH_TRACKER_TIMEOUT_MS: integerVar({ defaultValue: 30000, min: 1 }),
    TOPOGRAPH_GRAPH_DB_URL: urlVar({ required: true, protocols: NEO4J_PROTOCOLS }),
    TOPOGRAPH_GRAPH_DB_USER: stringVar(),
    TOPOGRAPH_GRAPH_DB_PASSWORD: stringVar({ trim: false }),
    TOPOGRAPH_GRAPH_DB_DATABASE: stringVar(),
    TOPOGRAPH_ROUTING_POLICY: enumVar(ROUTING_POLICIES, { defaultValue: 'broker-mesh' }),
    TOPOGRAPH_LOG_LEVEL: enumVar(LOG_LEVELS, { defaultValue: 'info' })
  })
  .superRefine((env, ctx) => {
    if ((env.TOPOGRAPH_GRAPH_DB_USER === undefined) !== (env.TOPOGRAPH_GRAPH_DB_PASSWORD === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['TOPOGRAPH_GRAPH_DB_PASSWORD'],
        message: 'TOPOGRAPH_GRAPH_DB_USER and TOPOGRAPH_GRAPH_DB_PASSWORD must be set together'
      });
    }
  })
  .transform(
    (env) =>
      ({
        // Required URLs are reported by the schema before this transform runs.
        trackerUrl: env.TOPOGRAPH_TRACKER_URL ?? '',
        trackerTimeoutMs: env.TOPOGRAPH_TRACKER_TIMEOUT_MS ?? 30000,
        graphDb: {
          url: env.TOPOGRAPH_GRAPH_DB_URL ?? '',
          user: env.TOPOGRAPH_GRAPH_DB_USER,
          password: env.TOPOGRAPH_GRAPH_DB_PASSWORD,
          database: env.TOPOGRAPH_GRAPH_DB_DATABASE
        },
        routingPolicy: env.TOPOGRAPH_ROUTING_POLICY,
        logLevel: env.TOPOGRAPH_LOG_LEVEL
      }) satisfies TopologyGraphConfig
  );

/** Resolves tracker and graph store endpoints; throws ConfigurationError when either is missing. */
export function loadTopologyGraphConfig(env?: EnvSource): TopologyGraphConfig {
  return loadEnvConfig(envSchema, { env, context: 'topograph:config' });
}
