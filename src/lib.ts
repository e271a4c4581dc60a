export * from './types.js';
export * from './errors.js';
export { loadConfig, validateConfig } from './config.js';
export type { ServerConfig } from './config.js';
export { LokiClient, DEFAULT_LOKI_PATHS } from './clients/loki-client.js';
export type { LokiClientConfig, LokiPaths, LogPusher, QueryOptions } from './clients/loki-client.js';
export {
  encodePushBatch,
  toPushRequest,
  decodeQueryResponse,
  decodeLabelsResponse,
  extractStreams,
  mergeLabels,
  labelSetKey,
  labelSetsEqual,
  toNanoseconds,
  formatLine
} from './services/wire-codec.js';
export { createLogRecord, recordFromPayload } from './services/log-record.js';
export type { LogEvent, FieldValue } from './services/log-record.js';
export { LogBatcher, DEFAULT_BATCHER_OPTIONS } from './services/log-batcher.js';
export type { LogBatcherOptions, BatchStatus, ShutdownOptions } from './services/log-batcher.js';
export { DropPolicy, BoundedRetryPolicy, DeadLetterPolicy, createFailurePolicy } from './services/flush-policy.js';
export type { FlushFailurePolicy, FailureOutcome } from './services/flush-policy.js';
export { LogShipper } from './services/log-shipper.js';
export type { LogShipperConfig } from './services/log-shipper.js';
export { Logger } from './services/logger.js';
export type { LoggerConfig } from './services/logger.js';
export { requestTimingMiddleware, buildRequestEvent } from './services/request-timing.js';
export type { RequestTiming, RequestTimingOptions } from './services/request-timing.js';
export { HealthMonitor } from './services/health.js';
export type { HealthMonitorConfig } from './services/health.js';
export { LokiIntegration } from './services/loki-integration.js';
export type { LokiIntegrationOptions } from './services/loki-integration.js';
export { LokiMcpServer } from './server.js';
