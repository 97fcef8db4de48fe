import type { Logger } from '../logger.js';
import type { DeliveryResult } from '../interfaces/event-sink.js';
import { errMsg } from './error.js';

export interface RetryOptions {
  /** Maximum number of retry attempts (default: 2). Total attempts = maxRetries + 1. */
  maxRetries?: number;
  log: Logger;
  /** Label for log messages (e.g. 'webhook'). */
  label: string;
}

/**
 * Run a delivery with retries. Both a thrown error and a returned
 * `{ success: false }` count as a failed attempt.
 */
export async function withRetry(
  fn: () => Promise<DeliveryResult>,
  opts: RetryOptions,
): Promise<DeliveryResult> {
  const maxRetries = opts.maxRetries ?? 2;
  let lastError: string | undefined;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    if (attempt > 0) {
      opts.log.info(`Retrying ${opts.label} (${attempt}/${maxRetries})...`);
    }

    try {
      const result = await fn();
      if (result.success) return result;
      lastError = result.error;
      opts.log.error(`${opts.label} failed: ${lastError}`);
    } catch (err) {
      lastError = errMsg(err);
      opts.log.error(`${opts.label} failed: ${lastError}`);
    }
  }

  return { success: false, error: lastError ?? `All ${opts.label} attempts failed` };
}
