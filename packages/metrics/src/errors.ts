export class MetricsCapabilityError extends Error {
  readonly code = 'METRIC_NOT_SUPPORTED';
  readonly metric: string;
  readonly backend: string;

  constructor(backend: string, metric: string) {
    super(`${backend} does not provide ${metric}`);
    this.name = 'MetricsCapabilityError';
    this.backend = backend;
    this.metric = metric;
  }
}
