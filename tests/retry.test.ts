import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../src/utils/retry.js';
import { RemoteError, TransportError } from '../src/utils/errors.js';
import { logger } from '../src/utils/logger.js';

vi.mock('../src/utils/logger.js', () => ({
  logger: {
    info: vi.fn(),
    success: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
    dim: vi.fn(),
  },
}));

describe('withRetry', () => {
  it('should return the first successful result', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new TransportError('timeout', { transient: true }))
      .mockResolvedValueOnce(42);

    await expect(withRetry(fn, 'Fetch', { baseDelayMs: 0 })).resolves.toBe(42);
    expect(fn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('Fetch failed (attempt 1/4), retrying in 0ms...');
  });

  it('should throw a non-transient error at once', async () => {
    const fn = vi.fn().mockRejectedValue(new RemoteError('HTTP 400', { status: 400 }));

    await expect(withRetry(fn, 'Create', { baseDelayMs: 0 })).rejects.toThrow('HTTP 400');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should give up after maxRetries retries', async () => {
    const fn = vi.fn().mockRejectedValue(new RemoteError('HTTP 502', { status: 502, transient: true }));

    await expect(withRetry(fn, 'Update', { maxRetries: 2, baseDelayMs: 0 })).rejects.toThrow('HTTP 502');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should honour a custom retry predicate', async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error('flaky'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, 'Call', { baseDelayMs: 0, shouldRetry: () => true })).resolves.toBe('ok');
  });
});
