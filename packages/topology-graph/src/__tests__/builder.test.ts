import assert from 'node:assert/strict';
import { test } from 'node:test';
import { PlanFetchError } from '@topograph/tracker-client';
import { LookupError, MemoryGraphStore, ParseError, TopologyGraphBuilder, scopeFilter } from '../index';
import { FakePlanSource, wordCountLogicalPlan, wordCountPhysicalPlan } from './fixtures';

const input = { topologyId: 'wordcount', snapshotRef: 'deploy-1', cluster: 'local', environ: 'default' };

test('buildSnapshot writes the snapshot and summarises it', async () => {
  const planSource = new FakePlanSource(wordCountLogicalPlan(), wordCountPhysicalPlan());
  const store = new MemoryGraphStore();
  const builder = new TopologyGraphBuilder({ planSource, store });

  const summary = await builder.buildSnapshot(input);

  assert.deepEqual(planSource.calls, ['logical:local/default/wordcount', 'physical:local/default/wordcount']);
  assert.equal(summary.topologyId, 'wordcount');
  assert.equal(summary.snapshotRef, 'deploy-1');
  assert.equal(summary.removedVertices, 0);
  assert.deepEqual(summary.vertices, { Broker: 1, Container: 1, Spout: 2, Bolt: 1 });
  assert.deepEqual(summary.edges, { IS_WITHIN: 4, LOGICALLY_CONNECTED: 2, PHYSICALLY_CONNECTED: 3 });
  assert.ok(summary.durationMs >= 0);

  const logical = await store.findEdges({ label: 'LOGICALLY_CONNECTED' });
  assert.deepEqual(
    logical.map((edge) => [edge.properties.streamName, edge.properties.grouping]),
    [
      ['default', 'SHUFFLE'],
      ['default', 'SHUFFLE']
    ]
  );
  const bolts = await store.findVertices({ label: 'Bolt', where: { component: 'count' } });
  assert.equal(bolts.length, 1);
  assert.equal(bolts[0]?.properties.taskId, 3);
});

test('snapshots of the same topology are isolated from each other', async () => {
  const store = new MemoryGraphStore();
  const builder = new TopologyGraphBuilder({
    planSource: new FakePlanSource(wordCountLogicalPlan(), wordCountPhysicalPlan()),
    store
  });

  await builder.buildSnapshot(input);
  await builder.buildSnapshot({ ...input, snapshotRef: 'deploy-2' });

  const first = await store.findVertices({ where: scopeFilter({ topologyId: 'wordcount', snapshotRef: 'deploy-1' }) });
  const second = await store.findVertices({ where: scopeFilter({ topologyId: 'wordcount', snapshotRef: 'deploy-2' }) });
  assert.equal(first.length, 5);
  assert.equal(second.length, 5);
  assert.equal((await store.findVertices({})).length, 10);
});

test('rebuilding a snapshot replaces its previous contents', async () => {
  const planSource = new FakePlanSource(wordCountLogicalPlan(), wordCountPhysicalPlan());
  const store = new MemoryGraphStore();
  const builder = new TopologyGraphBuilder({ planSource, store });
  await builder.buildSnapshot(input);

  const scaledDown = wordCountPhysicalPlan();
  scaledDown.spouts.word = ['container_1_word_1'];
  planSource.physicalPlan = scaledDown;
  const summary = await builder.buildSnapshot(input);

  assert.equal(summary.removedVertices, 5);
  assert.deepEqual(summary.vertices, { Broker: 1, Container: 1, Spout: 1, Bolt: 1 });
  assert.equal((await store.findVertices({})).length, 4);
  assert.deepEqual(summary.edges, { IS_WITHIN: 3, LOGICALLY_CONNECTED: 1, PHYSICALLY_CONNECTED: 2 });
  assert.equal((await store.findEdges({})).length, 6);
});

test('a malformed instance name leaves the store untouched', async () => {
  const physicalPlan = wordCountPhysicalPlan();
  physicalPlan.bolts.count = ['container_one_count_3'];
  const store = new MemoryGraphStore();
  const builder = new TopologyGraphBuilder({
    planSource: new FakePlanSource(wordCountLogicalPlan(), physicalPlan),
    store
  });

  await assert.rejects(builder.buildSnapshot(input), ParseError);
  assert.deepEqual(await store.findVertices({}), []);
});

test('a failed rebuild keeps the previous snapshot', async () => {
  const planSource = new FakePlanSource(wordCountLogicalPlan(), wordCountPhysicalPlan());
  const store = new MemoryGraphStore();
  const builder = new TopologyGraphBuilder({ planSource, store });
  await builder.buildSnapshot(input);

  const missingBolt = wordCountPhysicalPlan();
  delete missingBolt.bolts.count;
  planSource.physicalPlan = missingBolt;

  await assert.rejects(builder.buildSnapshot(input), LookupError);
  assert.equal((await store.findVertices({})).length, 5);
});

test('plan fetch failures propagate unchanged', async () => {
  const failure = new PlanFetchError('Topology wordcount not found', { statusCode: 404, code: 'TOPOLOGY_NOT_FOUND' });
  const planSource = new FakePlanSource(failure, wordCountPhysicalPlan());
  const builder = new TopologyGraphBuilder({ planSource, store: new MemoryGraphStore() });

  await assert.rejects(builder.buildSnapshot(input), (error: unknown) => error === failure);
  assert.deepEqual(planSource.calls, ['logical:local/default/wordcount']);
});

test('close closes the underlying store', async () => {
  const store = new MemoryGraphStore();
  const builder = new TopologyGraphBuilder({
    planSource: new FakePlanSource(wordCountLogicalPlan(), wordCountPhysicalPlan()),
    store
  });

  await builder.close();
  await assert.rejects(builder.buildSnapshot(input), { name: 'GraphStoreError', operation: 'replaceSnapshot' });
});
