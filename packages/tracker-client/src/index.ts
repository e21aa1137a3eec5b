export { TrackerClient } from './client';
export { PlanFetchError, TrackerClientError } from './errors';
export type { TrackerClientErrorOptions, TrackerErrorCode } from './errors';
export { logicalPlanSchema, metricsTimelineSchema, physicalPlanSchema } from './schemas';
export * from './types';
