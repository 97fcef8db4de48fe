import { createRequire } from 'node:module';
import { createLogger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import type { MqttConfig } from '../config/schema.js';
import type { MqttConnection } from '../mqtt/connection.js';
import { statusTopic } from '../mqtt/connection.js';
import type { BodyMetricsEvent, DeliveryResult, Notifier } from '../interfaces/event-sink.js';
import { stateDeviceId, type StateEntity, type StateSurface } from '../state/state-surface.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const log = createLogger('MQTT');

const DISCOVERY_PREFIX = 'homeassistant';
const NODE_ID = 'body_metrics';

export function personStateTopic(config: MqttConfig, entryId: string, slug: string): string {
  return `${config.topic}/${entryId}/${slug}/state`;
}

export function eventTopic(config: MqttConfig, eventName: string): string {
  return `${config.topic}/events/${eventName}`;
}

/**
 * Publishes per-person states (one JSON document per person), Home Assistant
 * discovery configs for every metric, and measurement events.
 */
export class MqttPublisher implements Notifier {
  readonly name = 'mqtt';
  private readonly lastPublished = new Map<string, string>();

  constructor(
    private readonly conn: MqttConnection,
    private readonly config: MqttConfig,
  ) {}

  async publishDiscovery(surface: StateSurface): Promise<void> {
    const status = statusTopic(this.config);

    for (const entity of surface.entities) {
      const topic = `${DISCOVERY_PREFIX}/sensor/${NODE_ID}/${entity.uniqueId}/config`;
      await this.conn.publishAsync(topic, JSON.stringify(this.discoveryPayload(entity, status)), {
        qos: 1,
        retain: true,
      });
    }

    await this.conn.publishAsync(status, 'online', { qos: 1, retain: true });
    log.info(
      `Published HA discovery for ${surface.entities.length} sensors of '${surface.entryId}'.`,
    );
  }

  discoveryPayload(entity: StateEntity, availabilityTopic: string): Record<string, unknown> {
    const { description: d } = entity;
    const payload: Record<string, unknown> = {
      name: d.name,
      unique_id: `${NODE_ID}_${entity.uniqueId}`,
      state_topic: personStateTopic(this.config, entity.entryId, entity.slug),
      value_template: `{{ value_json.${d.key} }}`,
      availability: [{ topic: availabilityTopic }],
      device: {
        identifiers: [`${NODE_ID}_${stateDeviceId(entity.entryId, entity.slug)}`],
        name: `${this.config.ha_device_name} ${entity.personName}`,
        manufacturer: 'Body Metrics',
        model: 'Body Composition',
        sw_version: pkg.version,
      },
    };
    if (d.deviceClass !== 'enum' && d.deviceClass !== 'timestamp') {
      payload.state_class = 'measurement';
    }
    if (d.unit) payload.unit_of_measurement = d.unit;
    if (d.deviceClass) payload.device_class = d.deviceClass;
    if (d.icon) payload.icon = d.icon;
    if (d.precision !== undefined) payload.suggested_display_precision = d.precision;
    if (d.options) payload.options = d.options;
    return payload;
  }

  /** Publish each person's values; unchanged documents are skipped. */
  async publishStates(surface: StateSurface): Promise<void> {
    for (const slug of surface.slugs) {
      const topic = personStateTopic(this.config, surface.entryId, slug);
      const body = JSON.stringify(surface.values(slug));
      if (this.lastPublished.get(topic) === body) continue;

      await this.conn.publishAsync(topic, body, {
        qos: this.config.qos,
        retain: this.config.retain,
      });
      this.lastPublished.set(topic, body);
      log.debug(`Published ${topic}`);
    }
  }

  async notify(event: BodyMetricsEvent): Promise<DeliveryResult> {
    const topic = eventTopic(this.config, event.name);
    try {
      await this.conn.publishAsync(topic, JSON.stringify(event.payload), {
        qos: this.config.qos,
        retain: false,
      });
      log.info(`Published ${event.name} for ${event.payload.person}.`);
      return { success: true };
    } catch (err) {
      return { success: false, error: errMsg(err) };
    }
  }

  async close(): Promise<void> {
    await this.conn.publishAsync(statusTopic(this.config), 'offline', { qos: 1, retain: true });
    await this.conn.endAsync();
  }
}
