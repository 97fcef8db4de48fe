import { join } from 'node:path';
import { createLogger } from './logger.js';
import { errMsg } from './utils/error.js';
import type { AppConfig } from './config/schema.js';
import { ScaleCoordinator } from './coordinator.js';
import { EventBus, runHealthchecks } from './events.js';
import type { Notifier } from './interfaces/event-sink.js';
import type { HistoryData } from './interfaces/history-store.js';
import type { MqttConnection } from './mqtt/connection.js';
import { MqttPublisher } from './publish/mqtt-publisher.js';
import { WebhookNotifier } from './publish/webhook.js';
import { MqttSensorSource } from './sensors/mqtt-source.js';
import { CommandHandler } from './service/commands.js';
import { StateSurface } from './state/state-surface.js';
import { JsonFileStore } from './storage/json-store.js';
import { HistoryDataSchema, RestoreDataSchema, type RestoreData } from './storage/schemas.js';

const log = createLogger('App');

export function historyPath(config: AppConfig, entryId: string): string {
  return join(config.storage.dir, `history.${entryId}.json`);
}

export function restorePath(config: AppConfig): string {
  return join(config.storage.dir, 'state.json');
}

/**
 * Wires every configured scale to the broker: sensor states in, per-person
 * states, discovery and events out, plus the reassign-guest command.
 */
export class BodyMetricsApp {
  readonly coordinators = new Map<string, ScaleCoordinator>();

  private readonly surfaces: StateSurface[] = [];
  private readonly source: MqttSensorSource;
  private readonly publisher: MqttPublisher;
  private readonly notifiers: Notifier[];
  private readonly bus: EventBus;
  private readonly commands: CommandHandler;
  private readonly restoreStore: JsonFileStore<RestoreData>;
  private readonly saveDelayMs: number;

  constructor(
    private readonly config: AppConfig,
    private readonly conn: MqttConnection,
  ) {
    const entities = config.scales.flatMap((s) =>
      s.impedance_sensor ? [s.weight_sensor, s.impedance_sensor] : [s.weight_sensor],
    );
    this.source = new MqttSensorSource(config.mqtt.state_stream_prefix, [...new Set(entities)]);
    this.publisher = new MqttPublisher(conn, config.mqtt);
    this.notifiers = config.webhook
      ? [this.publisher, new WebhookNotifier(config.webhook)]
      : [this.publisher];
    this.bus = new EventBus(this.notifiers);
    this.commands = new CommandHandler(conn, config.mqtt, this.coordinators);
    this.restoreStore = new JsonFileStore(restorePath(config), 'state', RestoreDataSchema);
    this.saveDelayMs = config.runtime.save_delay * 1000;

    for (const entry of config.scales) {
      const store = new JsonFileStore<HistoryData>(
        historyPath(config, entry.id),
        `history.${entry.id}`,
        HistoryDataSchema,
      );
      const coordinator = new ScaleCoordinator({
        entry,
        sensors: this.source,
        store,
        events: this.bus,
        pollIntervalMs: config.runtime.poll_interval * 1000,
        saveDelayMs: this.saveDelayMs,
        guestDetection: config.runtime.guest_detection,
      });
      this.coordinators.set(entry.id, coordinator);
    }
  }

  async start(): Promise<void> {
    const restore = (await this.restoreStore.load()) ?? {};

    this.conn.on('message', (topic, payload) => this.onMessage(topic, payload.toString('utf8')));
    await this.source.subscribe(this.conn);
    await this.commands.subscribe();

    for (const coordinator of this.coordinators.values()) {
      const surface = new StateSurface(coordinator, restore);
      this.surfaces.push(surface);
      coordinator.onUpdate(() => this.onUpdate(surface));

      if (this.config.mqtt.ha_discovery) {
        await this.publisher.publishDiscovery(surface);
      }
      await this.publisher.publishStates(surface);
    }

    await runHealthchecks(this.notifiers);

    for (const coordinator of this.coordinators.values()) {
      await coordinator.start();
    }
    log.info(`Started ${this.coordinators.size} scale(s).`);
  }

  /** Stop polling, flush history and restore data, then disconnect. */
  async stop(): Promise<void> {
    for (const coordinator of this.coordinators.values()) {
      await coordinator.stop();
    }
    await this.restoreStore.flush();
    await this.bus.drain();
    await this.publisher.close();
    log.info('Stopped.');
  }

  private onUpdate(surface: StateSurface): void {
    this.restoreStore.saveThrottled(() => this.collectRestoreData(), this.saveDelayMs);
    this.publisher.publishStates(surface).catch((err: unknown) => {
      log.error(`Failed to publish states for '${surface.entryId}': ${errMsg(err)}`);
    });
  }

  private collectRestoreData(): RestoreData {
    const out: RestoreData = {};
    for (const surface of this.surfaces) Object.assign(out, surface.toRestoreData());
    return out;
  }

  private onMessage(topic: string, payload: string): void {
    if (this.source.handleMessage(topic, payload)) return;
    this.commands.handleMessage(topic, payload).catch((err: unknown) => {
      log.error(`Command on ${topic} failed: ${errMsg(err)}`);
    });
  }
}
