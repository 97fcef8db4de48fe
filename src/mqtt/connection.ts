import { connectAsync, type IClientPublishOptions } from 'mqtt';
import { createLogger } from '../logger.js';
import type { MqttConfig } from '../config/schema.js';

const log = createLogger('MQTT');

const CONNECT_TIMEOUT_MS = 10_000;

/** The subset of the mqtt client the service relies on. */
export interface MqttConnection {
  publishAsync(topic: string, message: string, opts?: IClientPublishOptions): Promise<unknown>;
  subscribeAsync(topic: string | string[]): Promise<unknown>;
  endAsync(): Promise<void>;
  on(event: 'message', cb: (topic: string, payload: Buffer) => void): unknown;
}

export function statusTopic(config: MqttConfig): string {
  return `${config.topic}/status`;
}

/**
 * Open the long-lived broker connection. The broker marks the service
 * offline through the last-will message if the process dies.
 */
export async function connectMqtt(config: MqttConfig): Promise<MqttConnection> {
  const client = await Promise.race([
    connectAsync(config.broker_url, {
      clientId: config.client_id,
      username: config.username,
      password: config.password,
      connectTimeout: CONNECT_TIMEOUT_MS,
      will: { topic: statusTopic(config), payload: Buffer.from('offline'), qos: 1, retain: true },
    }),
    new Promise<never>((_resolve, reject) =>
      setTimeout(() => reject(new Error('MQTT connection timed out')), CONNECT_TIMEOUT_MS + 2_000),
    ),
  ]);
  log.info(`Connected to ${config.broker_url}`);
  return client;
}
