import { z } from 'zod';
import type {
  BoltComponent,
  BrokerEntry,
  LogicalPlan,
  MetricSample,
  MetricsTimeline,
  PhysicalPlan,
  SpoutComponent
} from './types';

function mapValues<T, R>(record: Record<string, T>, mapper: (value: T, key: string) => R): Record<string, R> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, mapper(value, key)]));
}

export const trackerEnvelopeSchema = z.object({
  status: z.string(),
  message: z.string().nullish(),
  result: z.unknown()
});

export type TrackerEnvelope = z.infer<typeof trackerEnvelopeSchema>;

const streamOutputSchema = z.object({
  stream_name: z.string().min(1)
});

const spoutSchema = z.object({
  spout_type: z.string(),
  spout_source: z.string(),
  outputs: z.array(streamOutputSchema).default([])
});

const boltInputSchema = z.object({
  component_name: z.string().min(1),
  stream_name: z.string().min(1),
  grouping: z.string().min(1)
});

const boltSchema = z.object({
  inputs: z.array(boltInputSchema).default([]),
  outputs: z.array(streamOutputSchema).default([])
});

export const logicalPlanSchema = z
  .object({
    spouts: z.record(spoutSchema).default({}),
    bolts: z.record(boltSchema).default({})
  })
  .transform(
    (raw): LogicalPlan => ({
      spouts: mapValues(
        raw.spouts,
        (spout): SpoutComponent => ({
          spoutType: spout.spout_type,
          spoutSource: spout.spout_source,
          outputs: spout.outputs.map((output) => output.stream_name)
        })
      ),
      bolts: mapValues(
        raw.bolts,
        (bolt): BoltComponent => ({
          inputs: bolt.inputs.map((input) => ({
            componentName: input.component_name,
            streamName: input.stream_name,
            grouping: input.grouping
          })),
          outputs: bolt.outputs.map((output) => output.stream_name)
        })
      )
    })
  );

const streamManagerSchema = z.object({
  id: z.string().min(1),
  host: z.string(),
  port: z.coerce.number().int(),
  shell_port: z.coerce.number().int()
});

const instanceSchema = z.object({
  stmgrId: z.string().min(1)
});

export const physicalPlanSchema = z
  .object({
    stmgrs: z.record(streamManagerSchema),
    spouts: z.record(z.array(z.string().min(1))).default({}),
    bolts: z.record(z.array(z.string().min(1))).default({}),
    instances: z.record(instanceSchema)
  })
  .transform(
    (raw): PhysicalPlan => ({
      brokers: mapValues(
        raw.stmgrs,
        (stmgr): BrokerEntry => ({
          id: stmgr.id,
          host: stmgr.host,
          port: stmgr.port,
          shellPort: stmgr.shell_port
        })
      ),
      spouts: raw.spouts,
      bolts: raw.bolts,
      instances: mapValues(raw.instances, (instance) => ({ brokerId: instance.stmgrId }))
    })
  );

const samplesSchema = z.record(z.coerce.number());

export const metricsTimelineSchema = z
  .object({
    component: z.string(),
    starttime: z.coerce.number(),
    endtime: z.coerce.number(),
    timeline: z.record(z.record(samplesSchema)).default({})
  })
  .transform(
    (raw): MetricsTimeline => ({
      component: raw.component,
      start: new Date(raw.starttime * 1000),
      end: new Date(raw.endtime * 1000),
      timeline: mapValues(raw.timeline, (instances) =>
        mapValues(instances, (samples): MetricSample[] =>
          Object.entries(samples)
            .map(([seconds, value]) => ({ timestamp: new Date(Number(seconds) * 1000), value }))
            .sort((left, right) => left.timestamp.getTime() - right.timestamp.getTime())
        )
      )
    })
  );
