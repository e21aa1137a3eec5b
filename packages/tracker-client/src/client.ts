import { fetch, Headers } from 'undici';
import type { RequestInit, Response } from 'undici';
import type { z } from 'zod';
import { PlanFetchError, TrackerClientError } from './errors';
import type { TrackerErrorClass } from './errors';
import { logicalPlanSchema, metricsTimelineSchema, physicalPlanSchema, trackerEnvelopeSchema } from './schemas';
import type {
  LogicalPlan,
  MetricsTimeline,
  MetricsTimelineQuery,
  PhysicalPlan,
  PlanSource,
  TrackerClientOptions
} from './types';

type QueryValue = string | number | string[] | undefined;

interface RequestOptions {
  query?: Record<string, QueryValue>;
  errorClass?: TrackerErrorClass;
}

async function resolveToken(token?: TrackerClientOptions['token']): Promise<string | null> {
  if (!token) {
    return null;
  }
  if (typeof token === 'function') {
    const resolved = await token();
    return resolved ? String(resolved) : null;
  }
  const trimmed = token.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function toEpochSeconds(value: Date): number {
  return Math.floor(value.getTime() / 1000);
}

export class TrackerClient implements PlanSource {
  private readonly baseUrl: URL;
  private readonly token?: TrackerClientOptions['token'];
  private readonly defaultHeaders: Record<string, string>;
  private readonly userAgent?: string;
  private readonly fetchTimeoutMs?: number;

  constructor(options: TrackerClientOptions) {
    if (!options.baseUrl) {
      throw new Error('TrackerClient requires a baseUrl');
    }
    const baseUrl = new URL(options.baseUrl);
    if (!baseUrl.pathname.endsWith('/')) {
      baseUrl.pathname = `${baseUrl.pathname}/`;
    }
    this.baseUrl = baseUrl;
    this.token = options.token;
    this.defaultHeaders = options.defaultHeaders ?? {};
    this.userAgent = options.userAgent;
    this.fetchTimeoutMs = options.fetchTimeoutMs;
  }

  async getLogicalPlan(cluster: string, environ: string, topologyId: string): Promise<LogicalPlan> {
    const result = await this.request('topologies/logicalplan', {
      query: { cluster, environ, topology: topologyId },
      errorClass: PlanFetchError
    });
    return this.parseDocument(logicalPlanSchema, result, `logical plan for ${topologyId}`, PlanFetchError);
  }

  async getPhysicalPlan(cluster: string, environ: string, topologyId: string): Promise<PhysicalPlan> {
    const result = await this.request('topologies/physicalplan', {
      query: { cluster, environ, topology: topologyId },
      errorClass: PlanFetchError
    });
    return this.parseDocument(physicalPlanSchema, result, `physical plan for ${topologyId}`, PlanFetchError);
  }

  async getMetricsTimeline(query: MetricsTimelineQuery): Promise<MetricsTimeline> {
    const result = await this.request('topologies/metricstimeline', {
      query: {
        cluster: query.cluster,
        environ: query.environ,
        topology: query.topology,
        component: query.component,
        metricname: query.metricNames,
        starttime: toEpochSeconds(query.start),
        endtime: toEpochSeconds(query.end),
        instance: query.instances
      }
    });
    return this.parseDocument(
      metricsTimelineSchema,
      result,
      `metrics timeline for ${query.topology}/${query.component}`,
      TrackerClientError
    );
  }

  private parseDocument<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    payload: unknown,
    description: string,
    errorClass: TrackerErrorClass
  ): T {
    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new errorClass(`Tracker returned a malformed ${description}`, {
        statusCode: 200,
        code: 'DOCUMENT_INVALID',
        details: parsed.error.issues
      });
    }
    return parsed.data;
  }

  /** Performs a GET and unwraps the tracker's `{ status, message, result }` envelope. */
  private async request(path: string, options: RequestOptions = {}): Promise<unknown> {
    const errorClass = options.errorClass ?? TrackerClientError;
    const url = this.buildUrl(path, options.query);
    const controller = new AbortController();
    let timeout: NodeJS.Timeout | undefined;
    if (this.fetchTimeoutMs && this.fetchTimeoutMs > 0) {
      timeout = setTimeout(() => {
        controller.abort(new Error('Request timed out'));
      }, this.fetchTimeoutMs);
    }

    let response: Response;
    try {
      response = await this.fetchRaw(url, {
        method: 'GET',
        headers: this.buildHeaders(),
        signal: controller.signal
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (controller.signal.aborted) {
        throw new errorClass(`Tracker request to ${url.pathname} timed out`, {
          statusCode: 0,
          code: 'TRACKER_TIMEOUT',
          details: message,
          cause: err
        });
      }
      throw new errorClass(`Tracker at ${this.baseUrl.origin} is unreachable: ${message}`, {
        statusCode: 0,
        code: 'TRACKER_UNREACHABLE',
        cause: err
      });
    } finally {
      if (timeout) {
        clearTimeout(timeout);
      }
    }

    if (!response.ok) {
      await this.handleErrorResponse(response, errorClass);
    }

    const envelope = trackerEnvelopeSchema.safeParse(await this.readJson(response));
    if (!envelope.success) {
      throw new errorClass(`Tracker response from ${url.pathname} is not a tracker envelope`, {
        statusCode: response.status,
        code: 'DOCUMENT_INVALID',
        details: envelope.error.issues
      });
    }
    if (envelope.data.status !== 'success') {
      throw new errorClass(envelope.data.message || `Tracker request to ${url.pathname} failed`, {
        statusCode: response.status,
        code: 'TRACKER_FAILURE',
        details: envelope.data.result
      });
    }
    return envelope.data.result;
  }

  private async readJson(response: Response): Promise<unknown> {
    try {
      return await response.json();
    } catch {
      return null;
    }
  }

  private async fetchRaw(input: URL, init: RequestInit): Promise<Response> {
    const headers = init.headers instanceof Headers ? init.headers : new Headers(init.headers ?? undefined);
    const token = await resolveToken(this.token);
    if (token && !headers.has('Authorization')) {
      headers.set('Authorization', `Bearer ${token}`);
    }
    return fetch(input, { ...init, headers });
  }

  private buildHeaders(): Headers {
    const headers = new Headers({ Accept: 'application/json' });
    for (const [key, value] of Object.entries(this.defaultHeaders)) {
      headers.set(key, value);
    }
    if (this.userAgent) {
      headers.set('User-Agent', this.userAgent);
    }
    return headers;
  }

  private buildUrl(path: string, query?: Record<string, QueryValue>): URL {
    const url = new URL(path, this.baseUrl);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value === undefined) {
          continue;
        }
        if (Array.isArray(value)) {
          for (const entry of value) {
            url.searchParams.append(key, entry);
          }
          continue;
        }
        url.searchParams.set(key, String(value));
      }
    }
    return url;
  }

  private async handleErrorResponse(response: Response, errorClass: TrackerErrorClass): Promise<never> {
    const payload = await this.readJson(response);
    const envelope = trackerEnvelopeSchema.safeParse(payload);
    const message = envelope.success && envelope.data.message ? envelope.data.message : null;

    throw new errorClass(message ?? (response.statusText || 'Tracker request failed'), {
      statusCode: response.status,
      code: response.status === 404 ? 'TOPOLOGY_NOT_FOUND' : 'TRACKER_REQUEST_FAILED',
      details: payload
    });
  }
}
