import {
  KNOWN_FIELD_NAMES,
  KnownLogFields,
  LabelSet,
  LogLevel,
  LogRecord,
  RecordTimestamp
} from '../types.js';

export type FieldValue = string | number | boolean | null | undefined;

/**
 * An application-level log event, already formatted to a message string.
 */
export interface LogEvent {
  message: string;
  level?: LogLevel;
  logger?: string;
  timestamp?: RecordTimestamp;
  source?: {
    module?: string;
    function?: string;
    line?: number;
  };
  fields?: Record<string, FieldValue>;
  labels?: LabelSet;
}

function isKnownField(key: string): key is keyof KnownLogFields {
  return KNOWN_FIELD_NAMES.some(name => name === key);
}

function stringifyField(value: unknown): string | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return JSON.stringify(value);
}

function splitFields(values: Record<string, unknown>): { fields: KnownLogFields; extra: Record<string, string> } {
  const fields: KnownLogFields = {};
  const extra: Record<string, string> = {};

  for (const [key, value] of Object.entries(values)) {
    const text = stringifyField(value);
    if (text === undefined) continue;
    if (isKnownField(key)) {
      fields[key] = text;
    } else {
      extra[key] = text;
    }
  }

  return { fields, extra };
}

function freezeRecord(record: LogRecord): LogRecord {
  Object.freeze(record.fields);
  Object.freeze(record.extra);
  if (record.labels) Object.freeze(record.labels);
  return Object.freeze(record);
}

export function createLogRecord(event: LogEvent): LogRecord {
  const { fields, extra } = splitFields({
    ...event.fields,
    ...(event.level && { level: event.level }),
    ...(event.logger && { logger: event.logger }),
    ...(event.source?.module && { module: event.source.module }),
    ...(event.source?.function && { function: event.source.function }),
    ...(event.source?.line !== undefined && { line: event.source.line })
  });

  return freezeRecord({
    timestamp: event.timestamp,
    message: event.message,
    fields,
    extra,
    ...(event.labels && { labels: { ...event.labels } })
  });
}

function isRecordTimestamp(value: unknown): value is RecordTimestamp {
  return (
    value instanceof Date ||
    typeof value === 'number' ||
    typeof value === 'bigint' ||
    typeof value === 'string'
  );
}

/**
 * Build a record from a loosely shaped payload such as a pushed JSON entry.
 * A non-string `message` makes the whole payload the line, serialized as JSON.
 */
export function recordFromPayload(payload: Record<string, unknown>, labels?: LabelSet): LogRecord {
  const { timestamp, message, ...rest } = payload;
  const line = typeof message === 'string' ? message : JSON.stringify(payload, jsonReplacer);
  const { fields, extra } = splitFields(rest);

  return freezeRecord({
    timestamp: isRecordTimestamp(timestamp) ? timestamp : undefined,
    message: line,
    fields,
    extra,
    ...(labels && { labels: { ...labels } })
  });
}

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
