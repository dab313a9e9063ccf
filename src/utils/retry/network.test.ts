import { describe, expect, it, vi } from 'vitest';
import { HardLimitError, RetriableError } from '@/errors';
import { withRetry } from './network';

describe('withRetry', () => {
  it('returns result on success without retry', async () => {
    const operation = vi.fn().mockResolvedValue('success');

    const result = await withRetry(operation, { baseDelay: 0 });

    expect(result).toBe('success');
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('retries transient errors until success', async () => {
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new RetriableError('socket hang up'))
      .mockResolvedValueOnce('second time');

    const result = await withRetry(operation, { baseDelay: 0 });

    expect(result).toBe('second time');
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it('gives up after maxAttempts and rethrows the last error', async () => {
    const operation = vi.fn().mockRejectedValue(new RetriableError('timeout'));

    await expect(withRetry(operation, { maxAttempts: 3, baseDelay: 0 })).rejects.toThrow('timeout');
    expect(operation).toHaveBeenCalledTimes(3);
  });

  it('passes the attempt number to the operation', async () => {
    const attempts: number[] = [];
    const operation = vi.fn(async (attempt: number) => {
      attempts.push(attempt);
      if (attempt < 3) throw new RetriableError('flaky');
      return attempt;
    });

    await expect(withRetry(operation, { baseDelay: 0 })).resolves.toBe(3);
    expect(attempts).toEqual([1, 2, 3]);
  });

  it('does not retry errors rejected by shouldRetry', async () => {
    const operation = vi.fn().mockRejectedValue(new HardLimitError());

    await expect(withRetry(operation, { baseDelay: 0 })).rejects.toBeInstanceOf(HardLimitError);
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it('reports each retry with a fixed delay when factor is 1', async () => {
    const onRetry = vi.fn();
    const operation = vi.fn().mockRejectedValue(new RetriableError('down'));

    await expect(withRetry(operation, { maxAttempts: 3, baseDelay: 0, factor: 1, onRetry })).rejects.toThrow('down');

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenNthCalledWith(1, 1, expect.any(RetriableError), 0);
    expect(onRetry).toHaveBeenNthCalledWith(2, 2, expect.any(RetriableError), 0);
  });

  it('does not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const operation = vi.fn().mockResolvedValue('never');

    await expect(withRetry(operation, { signal: controller.signal, baseDelay: 0 })).rejects.toThrow();
    expect(operation).not.toHaveBeenCalled();
  });
});
