/**
 * LogBatcher - buffer and flush scheduler for Loki shipping
 *
 * Records accumulate in a pending list. A flush swaps that list for an empty
 * one and hands the swapped records to background delivery; the caller never
 * waits on the network. Deliveries run through a bounded pool: at most
 * `maxInFlight` pushes at once, at most `maxQueuedBatches` waiting.
 */

import type { LogPusher } from '../clients/loki-client.js';
import { TimeoutError } from '../errors.js';
import { DropPolicy, FailureOutcome, FlushFailurePolicy } from './flush-policy.js';
import { Logger } from './logger.js';
import { FlushBatch, FlushTrigger, LabelSet, LogRecord } from '../types.js';

export interface LogBatcherOptions {
  maxBatchSize: number;      // capacity trigger (default: 50)
  flushInterval: number;     // interval trigger in ms (default: 5000)
  pushTimeout: number;       // per-push timeout in ms (default: 1000)
  flushDeadline: number;     // overall deadline per attempt in ms (default: 5000)
  maxInFlight: number;       // concurrent deliveries (default: 2)
  maxQueuedBatches: number;  // batches waiting for a delivery slot (default: 10)
  tickerEnabled: boolean;    // also check the interval trigger on a timer (default: false)
  labels?: LabelSet;
  failurePolicy?: FlushFailurePolicy;
  logger?: Logger;
}

export const DEFAULT_BATCHER_OPTIONS: LogBatcherOptions = {
  maxBatchSize: 50,
  flushInterval: 5000,
  pushTimeout: 1000,
  flushDeadline: 5000,
  maxInFlight: 2,
  maxQueuedBatches: 10,
  tickerEnabled: false
};

export interface ShutdownOptions {
  // Skip waiting for queued and in-flight deliveries; queued batches are dropped
  abandonInFlight?: boolean;
}

export interface BatchStatus {
  queueSize: number;
  maxBatchSize: number;
  flushInterval: number;
  inFlight: number;
  queuedBatches: number;
  lastFlush: string;
  flushes: number;
  deliveredRecords: number;
  droppedRecords: number;
  failurePolicy: string;
  closed: boolean;
}

export class LogBatcher {
  private pending: LogRecord[] = [];
  private lastFlush: number;
  private queued: FlushBatch[] = [];
  private inFlight = new Set<Promise<void>>();
  private nextBatchId = 1;
  private flushes = 0;
  private deliveredRecords = 0;
  private droppedRecords = 0;
  private closed = false;
  private ticker: NodeJS.Timeout | null = null;
  private options: LogBatcherOptions;
  private failurePolicy: FlushFailurePolicy;
  private logger: Logger;

  constructor(private pusher: LogPusher, options: Partial<LogBatcherOptions> = {}) {
    this.options = { ...DEFAULT_BATCHER_OPTIONS, ...options };
    this.failurePolicy = options.failurePolicy ?? new DropPolicy();
    this.logger = options.logger ?? new Logger({ logLevel: 'ERROR', component: 'log-batcher', enableConsole: true });
    this.lastFlush = Date.now();

    if (this.options.tickerEnabled) {
      this.startTicker();
    }
  }

  /**
   * Append a record to the pending buffer. Does not check triggers.
   */
  enqueue(record: LogRecord): void {
    if (this.closed) {
      this.droppedRecords++;
      return;
    }
    this.pending.push(record);
  }

  /**
   * The trigger that would fire now, if any
   */
  dueTrigger(now: number = Date.now()): FlushTrigger | null {
    if (this.pending.length === 0) {
      return null;
    }
    if (this.pending.length >= this.options.maxBatchSize) {
      return 'capacity';
    }
    if (now - this.lastFlush >= this.options.flushInterval) {
      return 'interval';
    }
    return null;
  }

  /**
   * Flush when the capacity or interval trigger fires. Returns the dispatched
   * batch, or null when nothing was due.
   */
  checkTriggers(now: number = Date.now()): FlushBatch | null {
    const trigger = this.dueTrigger(now);
    return trigger ? this.flush(trigger) : null;
  }

  /**
   * Swap the pending list for an empty one and dispatch the swapped records.
   * An empty buffer is a no-op. Returns immediately.
   */
  flush(trigger: FlushTrigger = 'explicit'): FlushBatch | null {
    if (this.pending.length === 0) {
      return null;
    }

    const records = this.pending;
    this.pending = [];
    this.lastFlush = Date.now();

    const batch: FlushBatch = Object.freeze({
      id: this.nextBatchId++,
      records,
      trigger,
      createdAt: this.lastFlush
    });
    this.flushes++;

    this.queued.push(batch);
    if (this.queued.length > this.options.maxQueuedBatches) {
      const overflow = this.queued.shift();
      if (overflow) {
        this.droppedRecords += overflow.records.length;
        this.logger.warn('FLUSH_QUEUE_OVERFLOW', 'Dropping oldest queued batch', {
          batchId: overflow.id,
          records: overflow.records.length,
          maxQueuedBatches: this.options.maxQueuedBatches
        });
      }
    }

    this.pump();
    return batch;
  }

  /**
   * Resolve once nothing is queued or in flight
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(Array.from(this.inFlight));
    }
  }

  async shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (this.closed) {
      return;
    }

    this.stopTicker();
    this.flush('shutdown');
    this.closed = true;

    if (options.abandonInFlight) {
      const abandoned = this.queued.reduce((count, batch) => count + batch.records.length, 0);
      this.droppedRecords += abandoned;
      this.queued = [];
      this.logger.info('BATCHER_SHUTDOWN', 'Abandoning queued batches', {
        abandonedRecords: abandoned,
        inFlight: this.inFlight.size
      });
      return;
    }

    await this.drain();
    this.logger.info('BATCHER_SHUTDOWN', 'Log batcher drained', { status: this.getBatchStatus() });
  }

  getBatchStatus(): BatchStatus {
    return {
      queueSize: this.pending.length,
      maxBatchSize: this.options.maxBatchSize,
      flushInterval: this.options.flushInterval,
      inFlight: this.inFlight.size,
      queuedBatches: this.queued.length,
      lastFlush: new Date(this.lastFlush).toISOString(),
      flushes: this.flushes,
      deliveredRecords: this.deliveredRecords,
      droppedRecords: this.droppedRecords,
      failurePolicy: this.failurePolicy.name,
      closed: this.closed
    };
  }

  private startTicker(): void {
    this.ticker = setInterval(() => {
      this.checkTriggers();
    }, this.options.flushInterval);
    this.ticker.unref();
  }

  private stopTicker(): void {
    if (this.ticker) {
      clearInterval(this.ticker);
      this.ticker = null;
    }
  }

  private pump(): void {
    while (this.inFlight.size < this.options.maxInFlight && this.queued.length > 0) {
      const batch = this.queued.shift();
      if (!batch) break;

      const task: Promise<void> = this.deliver(batch)
        .catch(error => {
          this.droppedRecords += batch.records.length;
          this.logger.error('FLUSH_FAILED', 'Loki delivery failed unexpectedly - logs dropped', {
            batchId: batch.id,
            error: error instanceof Error ? error.message : String(error)
          });
        })
        .finally(() => {
          this.inFlight.delete(task);
          this.pump();
        });
      this.inFlight.add(task);
    }
  }

  private async deliver(batch: FlushBatch): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      if (await this.attemptPush(batch, attempt)) {
        this.deliveredRecords += batch.records.length;
        return;
      }

      const outcome = this.outcomeFor(batch, attempt);
      if (outcome.action === 'retry' && !this.closed) {
        this.logger.debug('FLUSH_RETRY', 'Retrying Loki push', {
          batchId: batch.id,
          attempt,
          nextAttemptIn: outcome.delayMs
        });
        await sleep(outcome.delayMs);
        continue;
      }

      this.droppedRecords += batch.records.length;
      this.logger.debug('FLUSH_DROPPED', 'Failed to send logs to Loki (background) - logs dropped', {
        batchId: batch.id,
        records: batch.records.length,
        attempts: attempt,
        policy: this.failurePolicy.name
      });
      return;
    }
  }

  // A throwing policy counts as a drop
  private outcomeFor(batch: FlushBatch, attempt: number): FailureOutcome {
    try {
      return this.failurePolicy.onFailure(batch, attempt);
    } catch (error) {
      this.logger.warn('FLUSH_POLICY_ERROR', 'Failure policy threw - dropping batch', {
        batchId: batch.id,
        attempt,
        policy: this.failurePolicy.name,
        error: error instanceof Error ? error.message : String(error)
      });
      return { action: 'drop' };
    }
  }

  private async attemptPush(batch: FlushBatch, attempt: number): Promise<boolean> {
    const controller = new AbortController();
    try {
      return await withDeadline(
        this.pusher.pushLogs(batch.records, this.options.labels, this.options.pushTimeout, controller.signal),
        this.options.flushDeadline,
        () => controller.abort()
      );
    } catch (error) {
      this.logger.debug('FLUSH_ERROR', 'Error in background Loki flush', {
        batchId: batch.id,
        attempt,
        error: error instanceof Error ? error.message : String(error)
      });
      return false;
    }
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

function withDeadline<T>(promise: Promise<T>, deadlineMs: number, onDeadline: () => void): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      onDeadline();
      reject(new TimeoutError(deadlineMs));
    }, deadlineMs);
  });
  return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}
