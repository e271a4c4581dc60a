export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'FATAL';

export const LOG_LEVELS: readonly LogLevel[] = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'FATAL'];

export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4
};

/**
 * Stream labels. Equality ignores insertion order; see `labelSetKey`.
 */
export type LabelSet = Record<string, string>;

/**
 * Raw record timestamp, normalized to nanoseconds only when a batch is encoded:
 * - `Date` or a parseable date string: calendar time
 * - `number`: seconds since the epoch
 * - `bigint`: nanoseconds since the epoch
 */
export type RecordTimestamp = Date | number | bigint | string;

export interface KnownLogFields {
  level?: string;
  logger?: string;
  module?: string;
  function?: string;
  line?: string;
  action?: string;
  http_method?: string;
  http_url?: string;
  http_status_code?: string;
  http_duration?: string;
  client_ip?: string;
  user_agent?: string;
}

export const KNOWN_FIELD_NAMES: readonly (keyof KnownLogFields)[] = [
  'level',
  'logger',
  'module',
  'function',
  'line',
  'action',
  'http_method',
  'http_url',
  'http_status_code',
  'http_duration',
  'client_ip',
  'user_agent'
];

export interface LogRecord {
  readonly timestamp?: RecordTimestamp;
  readonly message: string;
  readonly fields: Readonly<KnownLogFields>;
  readonly extra: Readonly<Record<string, string>>;
  readonly labels?: Readonly<LabelSet>;
}

// [nanoseconds-as-decimal-string, line]
export type StreamEntry = [string, string];

export interface LogStream {
  labels: LabelSet;
  entries: StreamEntry[];
}

export interface PushBatch {
  readonly streams: readonly LogStream[];
  readonly recordCount: number;
}

export type LineFormat = 'text' | 'json';

export type QueryDirection = 'forward' | 'backward';

export interface QueryData {
  result: unknown[];
  resultType?: string;
  [key: string]: unknown;
}

export interface QueryResult {
  status: string;
  data: QueryData;
}

export type FlushTrigger = 'capacity' | 'interval' | 'explicit' | 'shutdown';

export interface FlushBatch {
  readonly id: number;
  readonly records: readonly LogRecord[];
  readonly trigger: FlushTrigger;
  readonly createdAt: number;
}

export type FailurePolicyName = 'drop' | 'retry' | 'dead-letter';

export interface ServiceHealth {
  service: string;
  status: 'up' | 'down';
  statusCode?: number;
  details?: unknown;
  error?: string;
}
