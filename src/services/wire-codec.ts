/**
 * Wire codec for the Loki HTTP API.
 *
 * Push payloads look like:
 * {
 *   "streams": [
 *     {
 *       "stream": { "service": "api", "environment": "prod" },
 *       "values": [["1704067200000000000", "line"], ...]
 *     }
 *   ]
 * }
 */

import { z } from 'zod';
import { CodecError } from '../errors.js';
import {
  LabelSet,
  LineFormat,
  LogRecord,
  LogStream,
  PushBatch,
  QueryResult,
  RecordTimestamp,
  StreamEntry
} from '../types.js';

export interface WireStream {
  stream: LabelSet;
  values: StreamEntry[];
}

export interface WirePushRequest {
  streams: WireStream[];
}

export interface EncodeOptions {
  defaultLabels: LabelSet;
  labels?: LabelSet;
  lineFormat?: LineFormat;
}

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;
const FRACTIONAL_SECONDS = /(:\d{2})\.(\d+)/;

export function nowNanoseconds(): string {
  return (BigInt(Date.now()) * NANOS_PER_MILLI).toString();
}

export function dateToNanoseconds(date: Date): string {
  return (BigInt(date.getTime()) * NANOS_PER_MILLI).toString();
}

/**
 * Normalize a record timestamp to nanoseconds since the epoch.
 * Anything missing or unusable becomes `fallbackNs`.
 */
export function toNanoseconds(timestamp: RecordTimestamp | undefined, fallbackNs: string): string {
  if (timestamp === undefined) {
    return fallbackNs;
  }

  if (typeof timestamp === 'bigint') {
    return timestamp >= 0n ? timestamp.toString() : fallbackNs;
  }

  if (timestamp instanceof Date) {
    return Number.isNaN(timestamp.getTime()) ? fallbackNs : dateToNanoseconds(timestamp);
  }

  if (typeof timestamp === 'number') {
    if (!Number.isFinite(timestamp) || timestamp < 0) {
      return fallbackNs;
    }
    // Split so the integral seconds survive beyond 2^53 nanoseconds
    const seconds = Math.trunc(timestamp);
    const fraction = Math.round((timestamp - seconds) * 1e9);
    return (BigInt(seconds) * NANOS_PER_SECOND + BigInt(fraction)).toString();
  }

  // Date.parse keeps milliseconds only; the fraction is added back in full
  const fraction = FRACTIONAL_SECONDS.exec(timestamp);
  const parsed = Date.parse(fraction ? timestamp.replace(FRACTIONAL_SECONDS, '$1') : timestamp);
  if (Number.isNaN(parsed)) {
    return fallbackNs;
  }
  const fractionNs = fraction ? BigInt(fraction[2].padEnd(9, '0').slice(0, 9)) : 0n;
  return (BigInt(parsed) * NANOS_PER_MILLI + fractionNs).toString();
}

export function mergeLabels(...sets: (Readonly<LabelSet> | undefined)[]): LabelSet {
  const merged: LabelSet = {};
  for (const set of sets) {
    if (!set) continue;
    for (const [key, value] of Object.entries(set)) {
      merged[key] = value;
    }
  }
  return merged;
}

export function labelSetKey(labels: Readonly<LabelSet>): string {
  const entries = Object.entries(labels).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}

export function labelSetsEqual(a: Readonly<LabelSet>, b: Readonly<LabelSet>): boolean {
  return labelSetKey(a) === labelSetKey(b);
}

export function formatLine(record: LogRecord, lineFormat: LineFormat = 'text'): string {
  if (lineFormat === 'text') {
    return record.message;
  }
  return JSON.stringify({ message: record.message, ...record.fields, ...record.extra });
}

/**
 * Group records into streams by their merged label set. Stream order follows
 * the first record carrying each label set; entry order follows record order.
 */
export function encodePushBatch(records: readonly LogRecord[], options: EncodeOptions): PushBatch {
  const fallbackNs = nowNanoseconds();
  const baseLabels = mergeLabels(options.defaultLabels, options.labels);
  const streams = new Map<string, LogStream>();

  for (const record of records) {
    const labels = record.labels ? mergeLabels(baseLabels, record.labels) : baseLabels;
    const key = labelSetKey(labels);
    let stream = streams.get(key);
    if (!stream) {
      stream = { labels, entries: [] };
      streams.set(key, stream);
    }
    stream.entries.push([toNanoseconds(record.timestamp, fallbackNs), formatLine(record, options.lineFormat)]);
  }

  return {
    streams: Array.from(streams.values()),
    recordCount: records.length
  };
}

export function toPushRequest(batch: PushBatch): WirePushRequest {
  return {
    streams: batch.streams.map(stream => ({
      stream: { ...stream.labels },
      values: stream.entries.map((entry): StreamEntry => [entry[0], entry[1]])
    }))
  };
}

const queryResponseSchema = z.object({
  status: z.string().default('success'),
  data: z
    .object({
      result: z.array(z.unknown()).default([]),
      resultType: z.string().optional()
    })
    .passthrough()
    .default({})
});

const labelsResponseSchema = z.object({
  data: z.array(z.string()).default([])
});

const wireStreamSchema = z.object({
  stream: z.record(z.string()),
  values: z.array(z.tuple([z.string(), z.string()]))
});

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch (error) {
    throw new CodecError(`Malformed JSON response: ${error instanceof Error ? error.message : String(error)}`, {
      cause: error
    });
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`).join('; ');
}

export function decodeQueryResponse(body: string): QueryResult {
  const parsed = queryResponseSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    throw new CodecError(`Unexpected query response: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function decodeLabelsResponse(body: string): string[] {
  const parsed = labelsResponseSchema.safeParse(parseJson(body));
  if (!parsed.success) {
    throw new CodecError(`Unexpected labels response: ${describeIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data.data;
}

/**
 * Read the log streams out of a query result. Entries that are not streams
 * (matrix or vector results) are skipped.
 */
export function extractStreams(result: QueryResult): LogStream[] {
  const streams: LogStream[] = [];
  for (const entry of result.data.result) {
    const parsed = wireStreamSchema.safeParse(entry);
    if (parsed.success) {
      streams.push({ labels: parsed.data.stream, entries: parsed.data.values });
    }
  }
  return streams;
}
