import { createLogger } from '../logger.js';
import { errMsg, ServiceValidationError } from '../utils/error.js';
import type { MqttConfig } from '../config/schema.js';
import type { MqttConnection } from '../mqtt/connection.js';
import type { ScaleCoordinator } from '../coordinator.js';
import { parseReassignGuestRequest, reassignGuest } from './reassign-guest.js';

const log = createLogger('Commands');

export function commandTopic(config: MqttConfig, command: string): string {
  return `${config.topic}/command/${command}`;
}

/**
 * Control operations received over MQTT. Each command publishes its outcome
 * to `<topic>/command/<name>/result`.
 */
export class CommandHandler {
  private readonly reassignTopic: string;

  constructor(
    private readonly conn: MqttConnection,
    private readonly config: MqttConfig,
    private readonly coordinators: ReadonlyMap<string, ScaleCoordinator>,
  ) {
    this.reassignTopic = commandTopic(config, 'reassign_guest');
  }

  async subscribe(): Promise<void> {
    await this.conn.subscribeAsync(this.reassignTopic);
  }

  /** Returns true when the topic was a command topic. */
  async handleMessage(topic: string, payload: string): Promise<boolean> {
    if (topic !== this.reassignTopic) return false;

    let outcome: Record<string, unknown>;
    try {
      const request = parseReassignGuestRequest(parseJson(payload));
      const result = reassignGuest(this.coordinators, request);
      outcome = { success: true, ...result };
    } catch (err) {
      if (!(err instanceof ServiceValidationError)) throw err;
      log.error(`reassign_guest rejected: ${err.message}`);
      outcome = { success: false, code: err.code, error: err.message };
    }

    await this.conn.publishAsync(`${this.reassignTopic}/result`, JSON.stringify(outcome), {
      qos: this.config.qos,
      retain: false,
    });
    return true;
  }
}

function parseJson(payload: string): unknown {
  try {
    return JSON.parse(payload);
  } catch (err) {
    throw new ServiceValidationError('invalid_payload', `Payload is not JSON: ${errMsg(err)}`);
  }
}
