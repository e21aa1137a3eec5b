import { createLogger } from '@topograph/shared';
import type { EnvSource, Logger } from '@topograph/shared';
import { TrackerMetricsClient } from '@topograph/metrics';
import type { TopologyMetricsClient } from '@topograph/metrics';
import { createGraphStore, createTopologyGraphBuilder, loadTopologyGraphConfig } from '@topograph/topology-graph';
import type { GraphStore, TopologyGraphBuilder, TopologyGraphConfig } from '@topograph/topology-graph';
import { TrackerClient } from '@topograph/tracker-client';

export type TrackerTarget = {
  cluster: string;
  environ: string;
};

/** Everything a command touches outside its own arguments. */
export type CliContext = {
  env: EnvSource;
  stdout(line: string): void;
  stderr(line: string): void;
  setExitCode(code: number): void;
  createLogger(config: TopologyGraphConfig): Logger;
  createBuilder(config: TopologyGraphConfig, logger: Logger): TopologyGraphBuilder;
  createStore(config: TopologyGraphConfig, logger: Logger): GraphStore;
  createMetricsClient(config: TopologyGraphConfig, target: TrackerTarget, logger: Logger): TopologyMetricsClient;
};

export function createDefaultContext(): CliContext {
  return {
    env: process.env,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
    setExitCode: (code) => {
      process.exitCode = code;
    },
    createLogger: (config) => createLogger({ level: config.logLevel, name: 'topograph' }),
    createBuilder: createTopologyGraphBuilder,
    createStore: createGraphStore,
    createMetricsClient: (config, target, logger) =>
      new TrackerMetricsClient({
        tracker: new TrackerClient({ baseUrl: config.trackerUrl, fetchTimeoutMs: config.trackerTimeoutMs }),
        cluster: target.cluster,
        environ: target.environ,
        logger
      })
  };
}

export type CommandEnvironment = {
  config: TopologyGraphConfig;
  logger: Logger;
};

export function resolveEnvironment(context: CliContext): CommandEnvironment {
  const config = loadTopologyGraphConfig(context.env);
  return { config, logger: context.createLogger(config) };
}

/** Runs a command action, reporting failures on stderr with exit code 1. */
export async function runAction(context: CliContext, action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    context.stderr(message);
    context.setExitCode(1);
  }
}
