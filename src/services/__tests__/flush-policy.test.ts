import {
  BoundedRetryPolicy,
  createFailurePolicy,
  DeadLetterPolicy,
  DropPolicy
} from '../flush-policy.js';
import { createLogRecord } from '../log-record.js';
import { FlushBatch } from '../../types.js';

const batch = (id: number): FlushBatch => ({
  id,
  records: [createLogRecord({ message: `batch ${id}` })],
  trigger: 'explicit',
  createdAt: 0
});

describe('flush failure policies', () => {
  it('should always drop with the drop policy', () => {
    expect(new DropPolicy().onFailure()).toEqual({ action: 'drop' });
  });

  describe('BoundedRetryPolicy', () => {
    it('should back off exponentially until the attempt limit', () => {
      const policy = new BoundedRetryPolicy(3, 100);

      expect(policy.onFailure(batch(1), 1)).toEqual({ action: 'retry', delayMs: 100 });
      expect(policy.onFailure(batch(1), 2)).toEqual({ action: 'retry', delayMs: 200 });
      expect(policy.onFailure(batch(1), 3)).toEqual({ action: 'drop' });
    });

    it('should never retry with a single attempt', () => {
      expect(new BoundedRetryPolicy(1, 100).onFailure(batch(1), 1)).toEqual({ action: 'drop' });
    });
  });

  describe('DeadLetterPolicy', () => {
    it('should keep the most recent failed batches', () => {
      const policy = new DeadLetterPolicy(2);

      expect(policy.onFailure(batch(1))).toEqual({ action: 'drop' });
      policy.onFailure(batch(2));
      policy.onFailure(batch(3));

      expect(policy.entries().map(letter => letter.id)).toEqual([2, 3]);
      expect(policy.getStatus()).toEqual({ size: 2, capacity: 2, evicted: 1 });
    });

    it('should empty the ring on take', () => {
      const policy = new DeadLetterPolicy(5);
      policy.onFailure(batch(1));

      expect(policy.take().map(letter => letter.id)).toEqual([1]);
      expect(policy.entries()).toEqual([]);
    });
  });

  describe('createFailurePolicy', () => {
    const base = { retryAttempts: 4, retryDelay: 50, deadLetterCapacity: 7 };

    it('should build each policy from configuration', () => {
      expect(createFailurePolicy({ ...base, failurePolicy: 'drop' })).toBeInstanceOf(DropPolicy);

      const retry = createFailurePolicy({ ...base, failurePolicy: 'retry' });
      expect(retry).toBeInstanceOf(BoundedRetryPolicy);
      expect(retry.onFailure(batch(1), 3)).toEqual({ action: 'retry', delayMs: 200 });

      const deadLetter = createFailurePolicy({ ...base, failurePolicy: 'dead-letter' });
      expect(deadLetter).toBeInstanceOf(DeadLetterPolicy);
      expect(deadLetter.name).toBe('dead-letter');
    });
  });
});
