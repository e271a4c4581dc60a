import { FailurePolicyName, FlushBatch } from '../types.js';

export type FailureOutcome = { action: 'drop' } | { action: 'retry'; delayMs: number };

/**
 * Decides what happens to a batch whose background push failed.
 * Failed records never go back into the pending buffer.
 */
export interface FlushFailurePolicy {
  readonly name: FailurePolicyName;
  onFailure(batch: FlushBatch, attempt: number): FailureOutcome;
}

export class DropPolicy implements FlushFailurePolicy {
  readonly name = 'drop';

  onFailure(): FailureOutcome {
    return { action: 'drop' };
  }
}

/**
 * Retries inside the delivery slot with exponential backoff, then drops.
 */
export class BoundedRetryPolicy implements FlushFailurePolicy {
  readonly name = 'retry';

  constructor(
    readonly maxAttempts: number = 3,
    readonly baseDelayMs: number = 500
  ) {}

  onFailure(_batch: FlushBatch, attempt: number): FailureOutcome {
    if (attempt >= this.maxAttempts) {
      return { action: 'drop' };
    }
    return { action: 'retry', delayMs: this.baseDelayMs * Math.pow(2, attempt - 1) };
  }
}

/**
 * Drops from delivery but keeps the most recent failed batches in a bounded
 * ring for inspection or manual replay.
 */
export class DeadLetterPolicy implements FlushFailurePolicy {
  readonly name = 'dead-letter';
  private letters: FlushBatch[] = [];
  private evicted = 0;

  constructor(readonly capacity: number = 20) {}

  onFailure(batch: FlushBatch): FailureOutcome {
    this.letters.push(batch);
    if (this.letters.length > this.capacity) {
      this.letters.shift();
      this.evicted++;
    }
    return { action: 'drop' };
  }

  entries(): readonly FlushBatch[] {
    return [...this.letters];
  }

  /**
   * Remove and return every stored batch
   */
  take(): FlushBatch[] {
    const letters = this.letters;
    this.letters = [];
    return letters;
  }

  getStatus(): { size: number; capacity: number; evicted: number } {
    return { size: this.letters.length, capacity: this.capacity, evicted: this.evicted };
  }
}

export interface FailurePolicyConfig {
  failurePolicy: FailurePolicyName;
  retryAttempts: number;
  retryDelay: number;
  deadLetterCapacity: number;
}

export function createFailurePolicy(config: FailurePolicyConfig): FlushFailurePolicy {
  switch (config.failurePolicy) {
    case 'retry':
      return new BoundedRetryPolicy(config.retryAttempts, config.retryDelay);
    case 'dead-letter':
      return new DeadLetterPolicy(config.deadLetterCapacity);
    case 'drop':
      return new DropPolicy();
  }
}
