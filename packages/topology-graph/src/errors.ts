export class TopologyGraphError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TopologyGraphError';
  }
}

export class ParseError extends TopologyGraphError {
  readonly code = 'INSTANCE_NAME_INVALID';
  readonly token: string;

  constructor(token: string, reason: string) {
    super(`Cannot parse "${token}": ${reason}`);
    this.name = 'ParseError';
    this.token = token;
  }
}

export class LookupError extends TopologyGraphError {
  readonly code = 'VERTEX_NOT_FOUND';

  constructor(message: string) {
    super(message);
    this.name = 'LookupError';
  }
}

export class GraphStoreError extends TopologyGraphError {
  readonly code = 'GRAPH_STORE_FAILED';
  readonly operation: string;
  readonly backendCode: string | null;

  constructor(operation: string, cause: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Graph store failed during ${operation}: ${message}`, { cause });
    this.name = 'GraphStoreError';
    this.operation = operation;
    this.backendCode = readBackendCode(cause);
  }
}

function readBackendCode(cause: unknown): string | null {
  if (cause && typeof cause === 'object' && 'code' in cause && typeof cause.code === 'string') {
    return cause.code;
  }
  return null;
}
