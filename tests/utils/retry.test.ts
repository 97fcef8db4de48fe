import { describe, it, expect, vi } from 'vitest';
import { withRetry } from '../../src/utils/retry.js';
import type { Logger } from '../../src/logger.js';

function mockLogger(): Logger {
  const log: Logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(() => log),
  };
  return log;
}

describe('withRetry', () => {
  it('returns the first successful result', async () => {
    const fn = vi.fn().mockResolvedValue({ success: true });
    const log = mockLogger();
    const result = await withRetry(fn, { log, label: 'webhook' });
    expect(result).toEqual({ success: true });
    expect(fn).toHaveBeenCalledTimes(1);
    expect(log.info).not.toHaveBeenCalled();
  });

  it('retries failed results and thrown errors', async () => {
    const fn = vi
      .fn()
      .mockResolvedValueOnce({ success: false, error: 'HTTP 500' })
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce({ success: true });
    const log = mockLogger();

    const result = await withRetry(fn, { log, label: 'webhook' });

    expect(result).toEqual({ success: true });
    expect(fn).toHaveBeenCalledTimes(3);
    expect(log.error).toHaveBeenCalledWith('webhook failed: HTTP 500');
    expect(log.error).toHaveBeenCalledWith('webhook failed: ECONNRESET');
    expect(log.info).toHaveBeenCalledWith('Retrying webhook (1/2)...');
    expect(log.info).toHaveBeenCalledWith('Retrying webhook (2/2)...');
  });

  it('returns the last error once retries are exhausted', async () => {
    const fn = vi.fn().mockRejectedValue(new Error('timeout'));
    const result = await withRetry(fn, { log: mockLogger(), label: 'webhook', maxRetries: 1 });
    expect(result).toEqual({ success: false, error: 'timeout' });
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('falls back to a generic error when none was reported', async () => {
    const fn = vi.fn().mockResolvedValue({ success: false });
    const result = await withRetry(fn, { log: mockLogger(), label: 'mqtt', maxRetries: 0 });
    expect(result).toEqual({ success: false, error: 'All mqtt attempts failed' });
  });
});
