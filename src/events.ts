import { createLogger } from './logger.js';
import { errMsg } from './utils/error.js';
import type {
  BodyMetricsEvent,
  BodyMetricsEventName,
  EventPayload,
  EventSink,
  Notifier,
} from './interfaces/event-sink.js';

const log = createLogger('Events');

/**
 * Run healthchecks on all notifiers that support them.
 * Results are logged as warnings (non-fatal).
 */
export async function runHealthchecks(notifiers: Notifier[]): Promise<void> {
  const withHealthcheck = notifiers.filter(
    (n): n is Notifier & { healthcheck: NonNullable<Notifier['healthcheck']> } =>
      typeof n.healthcheck === 'function',
  );

  if (withHealthcheck.length === 0) return;

  log.info('Running notifier healthchecks...');
  const results = await Promise.allSettled(withHealthcheck.map((n) => n.healthcheck()));

  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    const name = withHealthcheck[i].name;
    if (result.status === 'fulfilled' && result.value.success) {
      log.info(`  ${name}: OK`);
    } else if (result.status === 'fulfilled') {
      log.warn(`  ${name}: ${result.value.error}`);
    } else {
      log.warn(`  ${name}: ${errMsg(result.reason)}`);
    }
  }
}

/**
 * Deliver one event to all notifiers in parallel.
 * Returns true if at least one notifier succeeded (or there are none).
 */
export async function dispatchEvent(
  notifiers: Notifier[],
  event: BodyMetricsEvent,
): Promise<boolean> {
  if (notifiers.length === 0) return true;

  const results = await Promise.allSettled(notifiers.map((n) => n.notify(event)));

  let allFailed = true;
  for (let i = 0; i < results.length; i++) {
    const result = results[i];
    const name = notifiers[i].name;
    if (result.status === 'fulfilled' && result.value.success) {
      allFailed = false;
    } else if (result.status === 'fulfilled') {
      log.error(`${name}: ${result.value.error}`);
    } else {
      log.error(`${name}: ${errMsg(result.reason)}`);
    }
  }

  if (allFailed) {
    log.error(`All notifiers failed for ${event.name}.`);
    return false;
  }
  return true;
}

/**
 * EventSink that hands events to notifiers without making the caller wait.
 * `drain()` resolves once every delivery started so far has settled.
 */
export class EventBus implements EventSink {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly notifiers: Notifier[]) {}

  emit(name: BodyMetricsEventName, payload: EventPayload): void {
    const delivery: Promise<void> = dispatchEvent(this.notifiers, { name, payload })
      .then(
        () => undefined,
        (err: unknown) => log.error(`Dispatch of ${name} failed: ${errMsg(err)}`),
      )
      .finally(() => this.inFlight.delete(delivery));
    this.inFlight.add(delivery);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}
