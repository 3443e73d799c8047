import { describe, it, expect, vi } from 'vitest';
import { retry } from '../../../src/utils/retry.js';

describe('retry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce('ok');
    const onRetry = vi.fn();

    const result = await retry(fn, { maxRetries: 3, baseDelay: 1, maxDelay: 5, jitter: 0, onRetry });
    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry.mock.calls[0][0]).toBe(1);
  });

  it('should give up after maxRetries and rethrow the last error', async () => {
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error(`fail ${calls}`);
    };
    await expect(retry(fn, { maxRetries: 2, baseDelay: 1, maxDelay: 2, jitter: 0 })).rejects.toThrow('fail 3');
    expect(calls).toBe(3);
  });

  it('should stop early when shouldRetry refuses', async () => {
    const fn = vi.fn().mockRejectedValue(new TypeError('fatal'));
    await expect(retry(fn, {
      maxRetries: 5,
      baseDelay: 1,
      shouldRetry: err => !(err instanceof TypeError),
    })).rejects.toThrow('fatal');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
