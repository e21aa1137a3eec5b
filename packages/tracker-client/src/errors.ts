export type TrackerErrorCode =
  | 'TRACKER_UNREACHABLE'
  | 'TRACKER_TIMEOUT'
  | 'TRACKER_REQUEST_FAILED'
  | 'TRACKER_FAILURE'
  | 'TOPOLOGY_NOT_FOUND'
  | 'DOCUMENT_INVALID';

export type TrackerClientErrorOptions = {
  statusCode: number;
  code: TrackerErrorCode;
  details?: unknown;
  cause?: unknown;
};

export class TrackerClientError extends Error {
  readonly statusCode: number;
  readonly code: TrackerErrorCode;
  readonly details: unknown;

  constructor(message: string, options: TrackerClientErrorOptions) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TrackerClientError';
    this.statusCode = options.statusCode;
    this.code = options.code;
    this.details = options.details;
  }
}

/**
 * Raised when a logical or physical plan cannot be fetched or does not
 * match the expected document shape.
 */
export class PlanFetchError extends TrackerClientError {
  constructor(message: string, options: TrackerClientErrorOptions) {
    super(message, options);
    this.name = 'PlanFetchError';
  }
}

export type TrackerErrorClass = new (message: string, options: TrackerClientErrorOptions) => TrackerClientError;
