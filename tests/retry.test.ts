import { describe, it, expect, vi } from 'vitest';
import { AuthError, PersistenceFailure } from '../server/errors';
import { isTransientError, withRetry } from '../server/utils/retry';

const noSleep = async () => {};

describe('withRetry', () => {
  it('should retry transient failures until success', async () => {
    const deadlock = Object.assign(new Error('deadlock detected'), { code: '40P01' });
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(deadlock)
      .mockRejectedValueOnce(deadlock)
      .mockResolvedValueOnce('saved');
    const sleep = vi.fn(noSleep);

    await expect(withRetry(fn, { sleep })).resolves.toBe('saved');
    expect(fn).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
  });

  it('should rethrow non-retryable errors immediately', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(new Error('syntax error at or near "SELEC"'));

    await expect(withRetry(fn, { sleep: noSleep })).rejects.toThrow('syntax error');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after the last attempt', async () => {
    const failure = new PersistenceFailure('write failed');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(failure);

    await expect(withRetry(fn, { maxRetries: 2, sleep: noSleep })).rejects.toBe(failure);
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('should cap the backoff delay', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(new PersistenceFailure('write failed'))
      .mockResolvedValueOnce('ok');
    const sleep = vi.fn(noSleep);

    await withRetry(fn, { initialDelayMs: 10_000, maxDelayMs: 500, sleep });
    expect(sleep).toHaveBeenCalledWith(500);
  });
});

describe('isTransientError', () => {
  it('should follow the engine error retryable flag', () => {
    expect(isTransientError(new PersistenceFailure('write failed'))).toBe(true);
    expect(isTransientError(new PersistenceFailure('row rejected', undefined, false))).toBe(false);
    expect(isTransientError(new AuthError())).toBe(false);
  });

  it('should recognise dropped connections', () => {
    expect(isTransientError(new Error('Connection terminated unexpectedly'))).toBe(true);
    expect(isTransientError('boom')).toBe(false);
  });
});
