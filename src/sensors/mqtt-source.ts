import { createLogger } from '../logger.js';
import type { SensorSource, SensorState } from '../interfaces/sensor-source.js';
import type { MqttConnection } from '../mqtt/connection.js';

const log = createLogger('SensorSource');

/**
 * Entity states mirrored to MQTT by Home Assistant's statestream
 * (`<prefix>/<domain>/<object_id>/state`). The last message per entity is
 * cached so that `read()` never waits on the network.
 */
export class MqttSensorSource implements SensorSource {
  private readonly states = new Map<string, string>();
  private readonly topics = new Map<string, string>();

  constructor(
    private readonly prefix: string,
    entityIds: readonly string[],
  ) {
    for (const entityId of entityIds) {
      this.topics.set(this.topicFor(entityId), entityId);
    }
  }

  topicFor(entityId: string): string {
    const [domain, objectId] = entityId.split('.', 2);
    return `${this.prefix}/${domain}/${objectId}/state`;
  }

  async subscribe(conn: MqttConnection): Promise<void> {
    const topics = [...this.topics.keys()];
    if (topics.length === 0) return;
    await conn.subscribeAsync(topics);
    log.info(`Subscribed to ${topics.length} sensor topic(s)`);
  }

  /** Returns true when the topic belongs to one of the watched entities. */
  handleMessage(topic: string, payload: string): boolean {
    const entityId = this.topics.get(topic);
    if (entityId === undefined) return false;

    const value = unquote(payload.trim());
    if (value === '') {
      this.states.delete(entityId);
    } else {
      this.states.set(entityId, value);
    }
    log.debug(`${entityId} = ${value || '(cleared)'}`);
    return true;
  }

  read(entityId: string): SensorState {
    const raw = this.states.get(entityId);
    if (raw === undefined) return { status: 'missing', rawValue: null };
    if (raw === 'unknown' || raw === 'unavailable') return { status: raw, rawValue: raw };
    return { status: 'ok', rawValue: raw };
  }
}

/** Statestream may publish states JSON-encoded ("\"70.2\""). */
function unquote(value: string): string {
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) {
    try {
      const parsed: unknown = JSON.parse(value);
      if (typeof parsed === 'string') return parsed;
    } catch {
      return value;
    }
  }
  return value;
}
