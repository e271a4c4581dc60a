import http from 'node:http';
import https from 'node:https';
import axios, { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { Attributes, Span, SpanStatusCode, Tracer, trace } from '@opentelemetry/api';
import { BackendRejectionError, LokiError, classifyError } from '../errors.js';
import { Logger } from '../services/logger.js';
import {
  dateToNanoseconds,
  decodeLabelsResponse,
  decodeQueryResponse,
  encodePushBatch,
  toPushRequest
} from '../services/wire-codec.js';
import { LabelSet, LineFormat, LogRecord, PushBatch, QueryDirection, QueryResult } from '../types.js';

export interface LokiPaths {
  push: string;
  query: string;
  labels: string;
  ready: string;
}

export const DEFAULT_LOKI_PATHS: LokiPaths = {
  push: '/loki/api/v1/push',
  query: '/loki/api/v1/query_range',
  labels: '/loki/api/v1/labels',
  ready: '/ready'
};

export interface LokiClientConfig {
  url: string;
  tenantId?: string;
  headers?: Record<string, string>;
  timeout?: number;        // general request timeout in ms (default: 30000)
  pushTimeout?: number;    // push timeout in ms when the caller gives none (default: 2000)
  healthTimeout?: number;  // readiness timeout in ms (default: 3000)
  defaultLabels?: LabelSet;
  lineFormat?: LineFormat;
  paths?: Partial<LokiPaths>;
  logger?: Logger;
  tracer?: Tracer;
}

export interface QueryOptions {
  start?: Date;
  end?: Date;
  limit?: number;
  direction?: QueryDirection;
  signal?: AbortSignal;
}

/**
 * The subset of the client the flush scheduler depends on.
 */
export interface LogPusher {
  pushLogs(records: readonly LogRecord[], labels?: LabelSet, timeoutMs?: number, signal?: AbortSignal): Promise<boolean>;
}

interface TimedRequestConfig extends InternalAxiosRequestConfig {
  startedAt?: number;
}

const PUSH_ACCEPTED = 204;
const OK = 200;

export class LokiClient implements LogPusher {
  private httpClient: AxiosInstance;
  private httpAgent: http.Agent;
  private httpsAgent: https.Agent;
  private logger: Logger;
  private tracer: Tracer;
  private paths: LokiPaths;
  private defaultLabels: LabelSet;
  private lineFormat: LineFormat;
  readonly baseUrl: string;
  readonly timeout: number;
  readonly pushTimeout: number;
  readonly healthTimeout: number;

  constructor(config: LokiClientConfig) {
    this.baseUrl = config.url.replace(/\/+$/, '');
    this.timeout = config.timeout ?? 30000;
    this.pushTimeout = config.pushTimeout ?? 2000;
    this.healthTimeout = config.healthTimeout ?? 3000;
    this.paths = { ...DEFAULT_LOKI_PATHS, ...config.paths };
    this.defaultLabels = { ...config.defaultLabels };
    this.lineFormat = config.lineFormat ?? 'text';
    this.tracer = config.tracer ?? trace.getTracer('loki-client');
    this.logger = config.logger ?? new Logger({
      logLevel: 'ERROR',
      component: 'loki-client',
      enableConsole: true
    });

    this.httpAgent = new http.Agent({ keepAlive: true });
    this.httpsAgent = new https.Agent({ keepAlive: true });

    this.httpClient = axios.create({
      baseURL: this.baseUrl,
      timeout: this.timeout,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      // Status and body are interpreted per operation
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      headers: {
        'User-Agent': 'loki-mcp/1.0.0',
        ...config.headers,
        ...(config.tenantId && { 'X-Scope-OrgID': config.tenantId })
      }
    });

    this.httpClient.interceptors.request.use((request: TimedRequestConfig) => {
      request.startedAt = Date.now();
      this.logger.logRequestStart(request.method?.toUpperCase() || 'GET', `${request.baseURL ?? ''}${request.url ?? ''}`);
      return request;
    });

    this.httpClient.interceptors.response.use(
      (response: AxiosResponse) => {
        const request: TimedRequestConfig = response.config;
        this.logger.logRequestSuccess(
          request.method?.toUpperCase() || 'GET',
          `${request.baseURL ?? ''}${request.url ?? ''}`,
          response.status,
          request.startedAt ? Date.now() - request.startedAt : 0
        );
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error)) {
          const request: TimedRequestConfig | undefined = error.config;
          this.logger.logRequestError(
            request?.method?.toUpperCase() || 'GET',
            `${request?.baseURL ?? ''}${request?.url ?? ''}`,
            error,
            request?.startedAt ? Date.now() - request.startedAt : 0,
            { code: error.code }
          );
        }
        return Promise.reject(error);
      }
    );

    this.logger.info('CLIENT_INIT', `Initialized Loki client with URL: ${this.baseUrl}`, {
      timeout: this.timeout,
      pushTimeout: this.pushTimeout,
      healthTimeout: this.healthTimeout,
      tenant: config.tenantId ?? null
    });
  }

  getDefaultLabels(): LabelSet {
    return { ...this.defaultLabels };
  }

  /**
   * Encode records into a batch under the default labels and push it.
   * Caller labels override defaults key by key; per-record labels override both.
   */
  async pushLogs(
    records: readonly LogRecord[],
    labels?: LabelSet,
    timeoutMs?: number,
    signal?: AbortSignal
  ): Promise<boolean> {
    const batch = encodePushBatch(records, {
      defaultLabels: this.defaultLabels,
      labels,
      lineFormat: this.lineFormat
    });
    return this.push(batch, timeoutMs, signal);
  }

  /**
   * Push one batch. Resolves to true only when Loki answers 204; every other
   * outcome resolves to false. An aborted `signal` cancels the request.
   */
  async push(batch: PushBatch, timeoutMs?: number, signal?: AbortSignal): Promise<boolean> {
    const requestTimeout = timeoutMs ?? this.pushTimeout;
    const url = this.urlFor('push');

    return this.traced(
      'loki.push_logs',
      {
        'loki.operation': 'push',
        'loki.url': url,
        'loki.logs_count': batch.recordCount,
        'loki.streams_count': batch.streams.length,
        'loki.timeout_ms': requestTimeout
      },
      false,
      requestTimeout,
      async span => {
        const response = await this.httpClient.post<string>(this.paths.push, toPushRequest(batch), {
          headers: { 'Content-Type': 'application/json' },
          timeout: requestTimeout,
          signal
        });
        span.setAttribute('loki.response_status', response.status);

        if (response.status !== PUSH_ACCEPTED) {
          throw new BackendRejectionError(response.status, bodyText(response.data));
        }

        span.setAttribute('loki.success', true);
        this.logger.debug('PUSH_SUCCESS', `Successfully pushed ${batch.recordCount} logs to Loki`, {
          streams: batch.streams.length,
          timeout_ms: requestTimeout
        });
        return true;
      }
    );
  }

  async queryLogs(query: string, options: QueryOptions = {}): Promise<QueryResult | null> {
    const limit = options.limit ?? 100;
    const direction = options.direction ?? 'backward';
    const url = this.urlFor('query');

    const params: Record<string, string | number> = { query, limit, direction };
    if (options.start) params.start = dateToNanoseconds(options.start);
    if (options.end) params.end = dateToNanoseconds(options.end);

    return this.traced(
      'loki.query_logs',
      {
        'loki.operation': 'query',
        'loki.url': url,
        'loki.query': query,
        'loki.limit': limit,
        'loki.direction': direction,
        'loki.timeout_ms': this.timeout
      },
      null,
      this.timeout,
      async span => {
        const response = await this.httpClient.get<string>(this.paths.query, {
          params,
          signal: options.signal
        });
        span.setAttribute('loki.response_status', response.status);

        if (response.status !== OK) {
          throw new BackendRejectionError(response.status, bodyText(response.data));
        }

        const result = decodeQueryResponse(bodyText(response.data));
        span.setAttribute('loki.result_count', result.data.result.length);
        this.logger.debug('QUERY_SUCCESS', `Successfully queried Loki: ${result.data.result.length} streams`, {
          query,
          limit
        });
        return result;
      }
    );
  }

  async getLabels(): Promise<string[] | null> {
    const url = this.urlFor('labels');

    return this.traced(
      'loki.get_labels',
      {
        'loki.operation': 'labels',
        'loki.url': url,
        'loki.timeout_ms': this.timeout
      },
      null,
      this.timeout,
      async span => {
        const response = await this.httpClient.get<string>(this.paths.labels);
        span.setAttribute('loki.response_status', response.status);

        if (response.status !== OK) {
          throw new BackendRejectionError(response.status, bodyText(response.data));
        }

        const labels = decodeLabelsResponse(bodyText(response.data));
        span.setAttribute('loki.labels_count', labels.length);
        this.logger.debug('LABELS_SUCCESS', `Retrieved ${labels.length} labels from Loki`);
        return labels;
      }
    );
  }

  /**
   * Readiness probe. Uses the short health timeout, never the general one.
   */
  async healthCheck(timeoutMs: number = this.healthTimeout): Promise<boolean> {
    const url = this.urlFor('ready');

    return this.traced(
      'loki.health_check',
      {
        'loki.operation': 'health',
        'loki.url': url,
        'loki.timeout_ms': timeoutMs
      },
      false,
      timeoutMs,
      async span => {
        const response = await this.httpClient.get<string>(this.paths.ready, { timeout: timeoutMs });
        span.setAttribute('loki.response_status', response.status);
        return response.status === OK;
      }
    );
  }

  close(): void {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
    this.logger.debug('CLIENT_CLOSED', 'Loki client closed');
  }

  private urlFor(path: keyof LokiPaths): string {
    return `${this.baseUrl}${this.paths[path]}`;
  }

  /**
   * Run an operation inside a span. Failures are classified, recorded on the
   * span, logged, and turned into the operation's sentinel value.
   */
  private traced<T>(
    name: string,
    attributes: Attributes,
    fallback: T,
    timeoutMs: number,
    operation: (span: Span) => Promise<T>
  ): Promise<T> {
    return this.tracer.startActiveSpan(name, { attributes }, async span => {
      try {
        return await operation(span);
      } catch (error) {
        const failure = classifyError(error, timeoutMs);
        this.recordFailure(span, name, failure);
        return fallback;
      } finally {
        span.end();
      }
    });
  }

  private recordFailure(span: Span, operation: string, failure: LokiError): void {
    span.recordException(failure);
    span.setAttribute('loki.success', false);
    span.setAttribute('loki.error', failure.message);
    span.setAttribute('loki.error_kind', failure.kind);
    if (failure.kind === 'timeout') {
      span.setAttribute('loki.timeout_error', true);
    }
    span.setStatus({ code: SpanStatusCode.ERROR, message: failure.message });

    if (failure.kind === 'timeout') {
      this.logger.warn('LOKI_TIMEOUT', `Loki ${operation} ${failure.message}`, { operation });
    } else {
      this.logger.error('LOKI_FAILURE', `Loki ${operation} failed: ${failure.message}`, {
        operation,
        kind: failure.kind
      });
    }
  }
}

function bodyText(data: unknown): string {
  if (typeof data === 'string') return data;
  if (data === undefined || data === null) return '';
  return JSON.stringify(data);
}
