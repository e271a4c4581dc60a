/**
 * LokiIntegration - explicit lifecycle for the Loki pipeline
 *
 * Construct once at startup, pass the handle to whatever needs the client or
 * the shipper, and shut it down once. Access outside that window throws
 * LokiNotInitializedError.
 */

import type { RequestHandler } from 'express';
import type { Tracer } from '@opentelemetry/api';
import { LokiClient } from '../clients/loki-client.js';
import { ServerConfig } from '../config.js';
import { LokiNotInitializedError } from '../errors.js';
import { createFailurePolicy, FlushFailurePolicy } from './flush-policy.js';
import { LogBatcher } from './log-batcher.js';
import { LogShipper } from './log-shipper.js';
import { Logger } from './logger.js';
import { requestTimingMiddleware, RequestTimingOptions } from './request-timing.js';

export interface LokiIntegrationOptions {
  tracer?: Tracer;
  // Console logger for the pipeline's own diagnostics; never ships
  diagnostics?: Logger;
  failurePolicy?: FlushFailurePolicy;
}

interface IntegrationState {
  client: LokiClient;
  batcher: LogBatcher;
  shipper: LogShipper;
  failurePolicy: FlushFailurePolicy;
}

export class LokiIntegration {
  private state: IntegrationState | null = null;
  private phase: 'created' | 'running' | 'stopped' = 'created';
  private config: ServerConfig;
  private options: LokiIntegrationOptions;
  private diagnostics: Logger;

  constructor(config: ServerConfig, options: LokiIntegrationOptions = {}) {
    this.config = config;
    this.options = options;
    this.diagnostics = options.diagnostics ?? new Logger({
      logLevel: config.logLevel,
      component: 'loki',
      enableConsole: true
    });
  }

  initialize(): this {
    if (this.phase !== 'created') {
      throw new Error(`Loki integration cannot be initialized: it is already ${this.phase}`);
    }

    const { loki, shipping, labels } = this.config;

    const client = new LokiClient({
      url: loki.url,
      tenantId: loki.tenantId,
      timeout: loki.timeout,
      pushTimeout: loki.pushTimeout,
      healthTimeout: loki.healthTimeout,
      lineFormat: loki.lineFormat,
      defaultLabels: {
        service: labels.service,
        environment: labels.environment,
        instance: labels.instance
      },
      logger: this.diagnostics.child('loki-client'),
      tracer: this.options.tracer
    });

    const failurePolicy = this.options.failurePolicy ?? createFailurePolicy(shipping);

    const batcher = new LogBatcher(client, {
      maxBatchSize: shipping.batchSize,
      flushInterval: shipping.flushInterval,
      pushTimeout: shipping.backgroundTimeout,
      flushDeadline: shipping.flushDeadline,
      maxInFlight: shipping.maxInFlight,
      maxQueuedBatches: shipping.maxQueuedBatches,
      tickerEnabled: shipping.tickerEnabled,
      failurePolicy,
      logger: this.diagnostics.child('log-batcher')
    });

    const shipper = new LogShipper(batcher, {
      enabled: shipping.enabled,
      minLevel: this.config.logLevel
    });

    this.state = { client, batcher, shipper, failurePolicy };
    this.phase = 'running';

    this.diagnostics.info('LOKI_INIT', 'Loki integration initialized', {
      url: loki.url,
      handlerEnabled: shipping.enabled,
      failurePolicy: failurePolicy.name
    });
    return this;
  }

  get isInitialized(): boolean {
    return this.phase === 'running';
  }

  getClient(): LokiClient {
    return this.require().client;
  }

  getShipper(): LogShipper {
    return this.require().shipper;
  }

  getBatcher(): LogBatcher {
    return this.require().batcher;
  }

  getFailurePolicy(): FlushFailurePolicy {
    return this.require().failurePolicy;
  }

  /**
   * Application logger whose records are shipped when the handler is enabled
   */
  createLogger(component: string): Logger {
    const { shipper } = this.require();
    return new Logger({
      logLevel: this.config.logLevel,
      component,
      enableConsole: true,
      ...(this.config.shipping.enabled && { shipper })
    });
  }

  requestLogging(options?: RequestTimingOptions): RequestHandler {
    return requestTimingMiddleware(this.require().shipper, options);
  }

  /**
   * Flush and drain pending records, then release the client. Runs once.
   */
  async shutdown(): Promise<void> {
    if (this.phase !== 'running' || !this.state) {
      return;
    }

    const { client, shipper } = this.state;
    this.phase = 'stopped';
    this.state = null;

    await shipper.shutdown();
    client.close();
    this.diagnostics.info('LOKI_SHUTDOWN', 'Loki integration shut down');
  }

  private require(): IntegrationState {
    if (this.phase === 'stopped') {
      throw new LokiNotInitializedError('Loki integration has been shut down.');
    }
    if (!this.state) {
      throw new LokiNotInitializedError();
    }
    return this.state;
  }
}
