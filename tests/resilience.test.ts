import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  AbortedError,
  mapWithConcurrency,
  TimeoutError,
  withTimeout,
} from '../server/utils/resilience';

describe('Resilience Utilities', () => {
  describe('TimeoutError', () => {
    it('should create error with message and timeout', () => {
      const error = new TimeoutError('Operation timed out', 5000);
      expect(error.message).toBe('Operation timed out');
      expect(error.timeoutMs).toBe(5000);
      expect(error.name).toBe('TimeoutError');
    });
  });

  describe('AbortedError', () => {
    it('should create error with default message', () => {
      const error = new AbortedError();
      expect(error.message).toBe('Operation was cancelled');
      expect(error.name).toBe('AbortedError');
    });
  });

  describe('withTimeout', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('should return result if operation completes in time', async () => {
      const operation = vi.fn().mockResolvedValue('success');

      const promise = withTimeout(operation, { timeoutMs: 1000 });
      await vi.runAllTimersAsync();

      await expect(promise).resolves.toBe('success');
    });

    it('should throw TimeoutError if operation takes too long', async () => {
      const operation = () => new Promise<string>(resolve => setTimeout(() => resolve('late'), 2000));

      const promise = withTimeout(operation, { timeoutMs: 100, timeoutMessage: 'Custom timeout' });
      const assertion = expect(promise).rejects.toThrow('Custom timeout');
      await vi.advanceTimersByTimeAsync(100);

      await assertion;
    });

    it('should pass operation errors through', async () => {
      const promise = withTimeout(() => Promise.reject(new Error('Operation failed')), { timeoutMs: 1000 });
      await expect(promise).rejects.toThrow('Operation failed');
    });

    it('should reject with AbortedError when the signal fires', async () => {
      const controller = new AbortController();
      const operation = () => new Promise<string>(resolve => setTimeout(() => resolve('late'), 2000));

      const promise = withTimeout(operation, { timeoutMs: 5000, signal: controller.signal });
      const assertion = expect(promise).rejects.toBeInstanceOf(AbortedError);
      controller.abort();

      await assertion;
    });

    it('should not start the operation when already aborted', async () => {
      const controller = new AbortController();
      controller.abort();
      const operation = vi.fn().mockResolvedValue('success');

      await expect(withTimeout(operation, { signal: controller.signal })).rejects.toBeInstanceOf(AbortedError);
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('mapWithConcurrency', () => {
    it('should keep input order whatever the completion order', async () => {
      const delays = [30, 10, 20];
      const outcomes = await mapWithConcurrency(delays, 3, delay =>
        new Promise<number>(resolve => setTimeout(() => resolve(delay), delay))
      );

      expect(outcomes).toEqual([
        { status: 'fulfilled', value: 30 },
        { status: 'fulfilled', value: 10 },
        { status: 'fulfilled', value: 20 },
      ]);
    });

    it('should never run more than the limit at once', async () => {
      let running = 0;
      let peak = 0;
      await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
        running++;
        peak = Math.max(peak, running);
        await new Promise(resolve => setTimeout(resolve, 5));
        running--;
      });

      expect(peak).toBe(2);
    });

    it('should settle a failing item without stopping the others', async () => {
      const failure = new Error('bad item');
      const outcomes = await mapWithConcurrency(['a', 'b'], 1, async item => {
        if (item === 'a') throw failure;
        return item.toUpperCase();
      });

      expect(outcomes).toEqual([
        { status: 'rejected', reason: failure },
        { status: 'fulfilled', value: 'B' },
      ]);
    });

    it('should return an empty list for no items', async () => {
      await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
    });
  });
});
