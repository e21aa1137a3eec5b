import { Command } from 'commander';
import { countEdges, countVertices, scopeFilter } from '@topograph/topology-graph';
import type { SnapshotScope } from '@topograph/topology-graph';
import { resolveEnvironment, runAction } from '../context';
import type { CliContext } from '../context';
import { formatCounts } from '../lib/format';

type BuildOptions = {
  cluster: string;
  environ: string;
  json?: boolean;
};

function describeScope(scope: SnapshotScope): string {
  return `${scope.topologyId}/${scope.snapshotRef}`;
}

async function buildSnapshot(context: CliContext, scope: SnapshotScope, opts: BuildOptions): Promise<void> {
  const { config, logger } = resolveEnvironment(context);
  const builder = context.createBuilder(config, logger);
  try {
    const summary = await builder.buildSnapshot({ ...scope, cluster: opts.cluster, environ: opts.environ });
    if (opts.json) {
      context.stdout(JSON.stringify(summary, null, 2));
      return;
    }
    context.stdout(`Snapshot ${describeScope(scope)} written in ${summary.durationMs} ms`);
    context.stdout(`  vertices: ${formatCounts(summary.vertices)}`);
    context.stdout(`  edges: ${formatCounts(summary.edges)}`);
    context.stdout(`  replaced vertices: ${summary.removedVertices}`);
  } finally {
    await builder.close();
  }
}

async function summarizeSnapshot(context: CliContext, scope: SnapshotScope): Promise<void> {
  const { config, logger } = resolveEnvironment(context);
  const store = context.createStore(config, logger);
  try {
    const vertices = await store.findVertices({ where: scopeFilter(scope) });
    if (vertices.length === 0) {
      context.stderr(`No snapshot ${describeScope(scope)} in the graph store`);
      context.setExitCode(1);
      return;
    }
    const edges = await store.findEdges({ where: scopeFilter(scope) });
    context.stdout(`Snapshot ${describeScope(scope)}`);
    context.stdout(`  vertices: ${formatCounts(countVertices(vertices))}`);
    context.stdout(`  edges: ${formatCounts(countEdges(edges))}`);
  } finally {
    await store.close();
  }
}

async function dropSnapshot(context: CliContext, scope: SnapshotScope): Promise<void> {
  const { config, logger } = resolveEnvironment(context);
  const store = context.createStore(config, logger);
  try {
    const removed = await store.dropSnapshot(scope);
    context.stdout(`Removed ${removed} vertices of snapshot ${describeScope(scope)}`);
  } finally {
    await store.close();
  }
}

export function registerSnapshotCommands(program: Command, context: CliContext): void {
  program
    .command('build <topologyId> <snapshotRef>')
    .description('Fetch the plans of a running topology and write them as a graph snapshot')
    .requiredOption('--cluster <cluster>', 'Cluster the topology runs on')
    .requiredOption('--environ <environ>', 'Environment the topology runs in')
    .option('--json', 'Print the build summary as JSON')
    .action(async (topologyId: string, snapshotRef: string, opts: BuildOptions) => {
      await runAction(context, () => buildSnapshot(context, { topologyId, snapshotRef }, opts));
    });

  program
    .command('summary <topologyId> <snapshotRef>')
    .description('Count the vertices and edges stored for a snapshot')
    .action(async (topologyId: string, snapshotRef: string) => {
      await runAction(context, () => summarizeSnapshot(context, { topologyId, snapshotRef }));
    });

  program
    .command('drop <topologyId> <snapshotRef>')
    .description('Remove a snapshot from the graph store')
    .action(async (topologyId: string, snapshotRef: string) => {
      await runAction(context, () => dropSnapshot(context, { topologyId, snapshotRef }));
    });
}
