/**
 * LogShipper - producer-side entry point of the Loki pipeline
 * Turns application events into records and hands them to the batcher.
 * Never touches the network and never throws into the caller.
 */

import { BatchStatus, LogBatcher } from './log-batcher.js';
import { createLogRecord, LogEvent } from './log-record.js';
import { LOG_LEVEL_PRIORITY, LogLevel } from '../types.js';

export interface LogShipperConfig {
  enabled: boolean;
  minLevel: LogLevel;
}

export class LogShipper {
  private config: LogShipperConfig;
  private batcher: LogBatcher;
  private emitted = 0;
  private failures = 0;

  constructor(batcher: LogBatcher, config: LogShipperConfig) {
    this.batcher = batcher;
    this.config = config;
  }

  /**
   * Build a record from the event, enqueue it, and check the flush triggers
   */
  emit(event: LogEvent): void {
    if (!this.config.enabled) {
      return;
    }
    if (event.level && LOG_LEVEL_PRIORITY[event.level] < LOG_LEVEL_PRIORITY[this.config.minLevel]) {
      return;
    }

    try {
      const record = createLogRecord(event);
      this.batcher.enqueue(record);
      this.batcher.checkTriggers();
      this.emitted++;
    } catch (error) {
      this.failures++;
      // Printed rather than logged: the logger may itself be shipping through here
      console.error(`Error in Loki handler: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  /**
   * Fire-and-forget variant: the event is emitted on a later turn of the
   * event loop
   */
  emitAsync(event: LogEvent): void {
    setImmediate(() => this.emit(event));
  }

  /**
   * Force a flush of whatever is buffered
   */
  flush(): void {
    this.batcher.flush('explicit');
  }

  getHealthStatus(): { enabled: boolean; emitted: number; failures: number; minLevel: LogLevel; batcher: BatchStatus } {
    return {
      enabled: this.config.enabled,
      emitted: this.emitted,
      failures: this.failures,
      minLevel: this.config.minLevel,
      batcher: this.batcher.getBatchStatus()
    };
  }

  /**
   * Stop accepting events and flush what remains
   */
  async shutdown(): Promise<void> {
    this.config = { ...this.config, enabled: false };
    await this.batcher.shutdown();
  }
}
