/**
 * Health probes for the Loki backend and the Grafana instance in front of it.
 * Both run with the short health timeout and never throw.
 */

import axios, { AxiosInstance } from 'axios';
import { classifyError } from '../errors.js';
import { Logger } from './logger.js';
import { ServiceHealth } from '../types.js';

export interface HealthMonitorConfig {
  lokiUrl: string;
  grafanaUrl: string;
  grafanaUser: string;
  grafanaPassword: string;
  timeout: number;
  logger?: Logger;
}

export class HealthMonitor {
  private config: HealthMonitorConfig;
  private httpClient: AxiosInstance;
  private logger: Logger;

  constructor(config: HealthMonitorConfig) {
    this.config = config;
    this.logger = config.logger ?? new Logger({ logLevel: 'ERROR', component: 'health', enableConsole: true });
    this.httpClient = axios.create({
      timeout: config.timeout,
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data]
    });
  }

  async checkLoki(): Promise<ServiceHealth> {
    const url = `${this.config.lokiUrl.replace(/\/+$/, '')}/ready`;
    try {
      const response = await this.httpClient.get<string>(url);
      const text = typeof response.data === 'string' ? response.data.trim() : '';
      return {
        service: 'loki',
        status: response.status === 200 ? 'up' : 'down',
        statusCode: response.status,
        ...(text && { details: { response: text } })
      };
    } catch (error) {
      return this.down('loki', error);
    }
  }

  async checkGrafana(): Promise<ServiceHealth> {
    const url = `${this.config.grafanaUrl.replace(/\/+$/, '')}/api/health`;
    try {
      const response = await this.httpClient.get<string>(url, {
        auth: { username: this.config.grafanaUser, password: this.config.grafanaPassword }
      });
      return {
        service: 'grafana',
        status: response.status === 200 ? 'up' : 'down',
        statusCode: response.status,
        details: parseDetails(response.data, String(response.headers['content-type'] ?? ''))
      };
    } catch (error) {
      return this.down('grafana', error);
    }
  }

  async checkAll(): Promise<ServiceHealth[]> {
    return Promise.all([this.checkLoki(), this.checkGrafana()]);
  }

  private down(service: string, error: unknown): ServiceHealth {
    const failure = classifyError(error, this.config.timeout);
    this.logger.warn('HEALTH_CHECK_FAILED', `${service} health check failed: ${failure.message}`, {
      service,
      kind: failure.kind
    });
    return { service, status: 'down', error: failure.message };
  }
}

function parseDetails(body: unknown, contentType: string): unknown {
  const text = typeof body === 'string' ? body.trim() : '';
  if (contentType.startsWith('application/json')) {
    try {
      return JSON.parse(text);
    } catch {
      return { response: text };
    }
  }
  return { response: text };
}
