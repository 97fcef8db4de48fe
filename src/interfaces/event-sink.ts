export const EVENT_MEASUREMENT = 'body_metrics_measurement';
export const EVENT_GUEST_MEASUREMENT = 'body_metrics_guest_measurement';

export type BodyMetricsEventName = typeof EVENT_MEASUREMENT | typeof EVENT_GUEST_MEASUREMENT;

export type EventPayload = Record<string, string | number>;

export interface BodyMetricsEvent {
  name: BodyMetricsEventName;
  payload: EventPayload;
}

/** Fire-and-forget event emission. Implementations must not block the caller. */
export interface EventSink {
  emit(name: BodyMetricsEventName, payload: EventPayload): void;
}

export interface DeliveryResult {
  success: boolean;
  error?: string;
}

/** A downstream consumer of events (MQTT, webhook). */
export interface Notifier {
  readonly name: string;
  notify(event: BodyMetricsEvent): Promise<DeliveryResult>;
  healthcheck?(): Promise<DeliveryResult>;
}
