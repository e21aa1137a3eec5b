import assert from 'node:assert/strict';
import { test } from 'node:test';
import { MetricsCapabilityError } from '@topograph/metrics';
import type { MetricsQueryOptions, MetricsTable, TopologyMetricsClient } from '@topograph/metrics';
import { createProgram } from '../src';
import { StaticPlanSource, createHarness, logicalPlan, physicalPlan } from './helpers';
import type { TestHarness } from './helpers';

async function run(harness: TestHarness, args: string[]): Promise<void> {
  const program = createProgram(harness.context);
  for (const command of [program, ...program.commands]) {
    command.exitOverride();
    command.configureOutput({ writeOut: () => undefined, writeErr: () => undefined });
  }
  await program.parseAsync(args, { from: 'user' });
}

class FakeMetricsClient implements TopologyMetricsClient {
  readonly calls: Array<{ method: string; topologyId: string; options?: MetricsQueryOptions }> = [];

  private record(method: string, topologyId: string, options?: MetricsQueryOptions): MetricsTable {
    this.calls.push({ method, topologyId, options });
    return [
      {
        timestamp: new Date(1700000000000),
        component: 'count',
        container: 1,
        taskId: 3,
        stream: 'words',
        sourceComponent: 'split',
        value: 12.5
      }
    ];
  }

  async getServiceTimes(topologyId: string, _start: Date, _end: Date, options?: MetricsQueryOptions) {
    return this.record('getServiceTimes', topologyId, options);
  }

  async getReceiveCounts(): Promise<MetricsTable> {
    throw new MetricsCapabilityError('tracker', 'receive counts');
  }

  async getEmitCounts(topologyId: string, _start: Date, _end: Date, options?: MetricsQueryOptions) {
    return this.record('getEmitCounts', topologyId, options);
  }

  async getExecuteCounts(topologyId: string, _start: Date, _end: Date, options?: MetricsQueryOptions) {
    return this.record('getExecuteCounts', topologyId, options);
  }
}

test('build writes a snapshot and prints its counts', async () => {
  const harness = createHarness();
  await run(harness, ['build', 'wordcount', 'deploy-1', '--cluster', 'local', '--environ', 'default']);

  assert.equal(harness.stdout.length, 4);
  assert.match(harness.stdout[0] ?? '', /^Snapshot wordcount\/deploy-1 written in \d+ ms$/);
  assert.deepEqual(harness.stdout.slice(1), [
    '  vertices: Broker=1 Container=1 Spout=2 Bolt=1',
    '  edges: IS_WITHIN=4 LOGICALLY_CONNECTED=2 PHYSICALLY_CONNECTED=3',
    '  replaced vertices: 0'
  ]);
  assert.equal(harness.exitCode(), undefined);
  assert.equal(harness.store.closeCalls, 1);
});

test('build --json prints the summary document', async () => {
  const harness = createHarness();
  await run(harness, ['build', 'wordcount', 'deploy-1', '--cluster', 'local', '--environ', 'default', '--json']);

  const summary: { vertices: unknown; cluster: unknown } = JSON.parse(harness.stdout.join('\n'));
  assert.deepEqual(summary.vertices, { Broker: 1, Container: 1, Spout: 2, Bolt: 1 });
  assert.equal(summary.cluster, 'local');
});

test('build reports plan errors with exit code 1', async () => {
  const broken = { ...physicalPlan, bolts: { count: ['container_1_count'] } };
  const harness = createHarness({ planSource: new StaticPlanSource(logicalPlan, broken) });
  await run(harness, ['build', 'wordcount', 'deploy-1', '--cluster', 'local', '--environ', 'default']);

  assert.deepEqual(harness.stdout, []);
  assert.deepEqual(harness.stderr, [
    'Cannot parse "container_1_count": expected container_<container>_<component>_<task>'
  ]);
  assert.equal(harness.exitCode(), 1);
  assert.deepEqual(await harness.store.findVertices({}), []);
});

test('summary counts a stored snapshot', async () => {
  const harness = createHarness();
  await run(harness, ['build', 'wordcount', 'deploy-1', '--cluster', 'local', '--environ', 'default']);
  harness.stdout.length = 0;

  await run(harness, ['summary', 'wordcount', 'deploy-1']);
  assert.deepEqual(harness.stdout, [
    'Snapshot wordcount/deploy-1',
    '  vertices: Broker=1 Container=1 Spout=2 Bolt=1',
    '  edges: IS_WITHIN=4 LOGICALLY_CONNECTED=2 PHYSICALLY_CONNECTED=3'
  ]);
});

test('summary of an unknown snapshot fails', async () => {
  const harness = createHarness();
  await run(harness, ['summary', 'wordcount', 'deploy-9']);

  assert.deepEqual(harness.stderr, ['No snapshot wordcount/deploy-9 in the graph store']);
  assert.equal(harness.exitCode(), 1);
});

test('drop removes a snapshot', async () => {
  const harness = createHarness();
  await run(harness, ['build', 'wordcount', 'deploy-1', '--cluster', 'local', '--environ', 'default']);
  harness.stdout.length = 0;

  await run(harness, ['drop', 'wordcount', 'deploy-1']);
  assert.deepEqual(harness.stdout, ['Removed 5 vertices of snapshot wordcount/deploy-1']);
  assert.deepEqual(await harness.store.findEdges({}), []);
});

test('missing configuration is reported before any command runs', async () => {
  const harness = createHarness({ env: {} });
  await run(harness, ['drop', 'wordcount', 'deploy-1']);

  assert.equal(harness.stderr.length, 1);
  assert.equal(
    harness.stderr[0],
    [
      '[topograph:config] Invalid environment configuration',
      '  - TOPOGRAPH_TRACKER_URL: Missing required TOPOGRAPH_TRACKER_URL',
      '  - TOPOGRAPH_GRAPH_DB_URL: Missing required TOPOGRAPH_GRAPH_DB_URL'
    ].join('\n')
  );
  assert.equal(harness.exitCode(), 1);
});

test('metrics prints rows as CSV', async () => {
  const metricsClient = new FakeMetricsClient();
  const harness = createHarness({ metricsClient });
  await run(harness, [
    'metrics',
    'wordcount',
    '--kind',
    'execute-counts',
    '--cluster',
    'local',
    '--environ',
    'default',
    '--start',
    '2023-11-14T22:13:20Z',
    '--end',
    '2023-11-14T22:15:20Z',
    '--component',
    'count',
    '--component',
    'split'
  ]);

  assert.deepEqual(metricsClient.calls, [
    { method: 'getExecuteCounts', topologyId: 'wordcount', options: { components: ['count', 'split'] } }
  ]);
  assert.deepEqual(harness.stdout, [
    'timestamp,component,container,taskId,stream,sourceComponent,value',
    '2023-11-14T22:13:20.000Z,count,1,3,words,split,12.5'
  ]);
});

test('metrics reports unsupported metric kinds', async () => {
  const harness = createHarness({ metricsClient: new FakeMetricsClient() });
  await run(harness, [
    'metrics',
    'wordcount',
    '--kind',
    'receive-counts',
    '--cluster',
    'local',
    '--environ',
    'default',
    '--start',
    '2023-11-14T22:13:20Z',
    '--end',
    '2023-11-14T22:15:20Z'
  ]);

  assert.deepEqual(harness.stderr, ['tracker does not provide receive counts']);
  assert.equal(harness.exitCode(), 1);
});

test('metrics rejects unknown kinds and malformed timestamps', async () => {
  const harness = createHarness({ metricsClient: new FakeMetricsClient() });
  const base = ['metrics', 'wordcount', '--cluster', 'local', '--environ', 'default', '--end', '2023-11-14T22:15:20Z'];

  await assert.rejects(run(harness, [...base, '--kind', 'latency', '--start', '2023-11-14T22:13:20Z']), {
    code: 'commander.invalidArgument'
  });
  await assert.rejects(run(harness, [...base, '--kind', 'emit-counts', '--start', 'yesterday']), {
    code: 'commander.invalidArgument'
  });
});
