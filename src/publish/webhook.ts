import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import { withRetry } from '../utils/retry.js';
import type { WebhookConfig } from '../config/schema.js';
import type { BodyMetricsEvent, DeliveryResult, Notifier } from '../interfaces/event-sink.js';

const log = createLogger('Webhook');

/** POSTs (or PUTs) every event as `{ event, ...payload }`. */
export class WebhookNotifier implements Notifier {
  readonly name = 'webhook';

  constructor(private readonly config: WebhookConfig) {}

  async healthcheck(): Promise<DeliveryResult> {
    try {
      const response = await fetch(this.config.url, {
        method: 'HEAD',
        signal: AbortSignal.timeout(5000),
      });
      if (!response.ok) {
        return { success: false, error: `HTTP ${response.status}` };
      }
      return { success: true };
    } catch (err) {
      return { success: false, error: errMsg(err) };
    }
  }

  async notify(event: BodyMetricsEvent): Promise<DeliveryResult> {
    const { url, method, headers, timeout } = this.config;
    const body = JSON.stringify({ event: event.name, ...event.payload });

    return withRetry(
      async () => {
        const response = await fetch(url, {
          method,
          headers: { 'Content-Type': 'application/json', ...headers },
          body,
          signal: AbortSignal.timeout(timeout),
        });

        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }

        log.info(`Webhook delivered ${event.name} (HTTP ${response.status}).`);
        return { success: true };
      },
      { log, label: 'webhook' },
    );
  }
}
