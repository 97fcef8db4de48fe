import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { createLogger, type Logger } from '../logger.js';
import { errMsg } from '../utils/error.js';
import type { DataStore } from '../interfaces/history-store.js';
import { atomicWrite, createWriteLock, type WriteLock } from './write.js';

const STORE_VERSION = 1;

const EnvelopeSchema = z.object({
  version: z.literal(STORE_VERSION),
  key: z.string(),
  data: z.unknown(),
});

/**
 * A JSON document on disk, wrapped as `{ version, key, data }`.
 * Unreadable or invalid files load as null with a warning.
 */
export class JsonFileStore<T> implements DataStore<T> {
  private readonly log: Logger;
  private readonly lock: WriteLock = createWriteLock();
  private timer: ReturnType<typeof setTimeout> | null = null;
  private producer: (() => T) | null = null;

  constructor(
    private readonly filePath: string,
    private readonly key: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ) {
    this.log = createLogger('Store').child(key);
  }

  async load(): Promise<T | null> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf8');
    } catch (err) {
      if (isNotFound(err)) return null;
      this.log.warn(`Cannot read ${this.filePath}: ${errMsg(err)}`);
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.log.warn(`Ignoring corrupt ${this.filePath}: ${errMsg(err)}`);
      return null;
    }

    const envelope = EnvelopeSchema.safeParse(json);
    if (!envelope.success || envelope.data.key !== this.key) {
      this.log.warn(`Ignoring ${this.filePath}: not a '${this.key}' store file`);
      return null;
    }

    const data = this.schema.safeParse(envelope.data.data);
    if (!data.success) {
      const reason = data.error.issues[0]?.message ?? 'invalid data';
      this.log.warn(`Ignoring ${this.filePath}: ${reason}`);
      return null;
    }
    return data.data;
  }

  saveDebounced(producer: () => T, delayMs: number): void {
    this.producer = producer;
    if (this.timer) clearTimeout(this.timer);
    this.schedule(delayMs);
  }

  /**
   * Like saveDebounced, but later requests keep the first deadline and only
   * replace the producer, so a steady stream of requests still gets written.
   */
  saveThrottled(producer: () => T, delayMs: number): void {
    this.producer = producer;
    if (!this.timer) this.schedule(delayMs);
  }

  async flush(): Promise<void> {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.writePending();
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.writePending().catch((err: unknown) => {
        this.log.error(`Failed to save ${this.filePath}: ${errMsg(err)}`);
      });
    }, delayMs);
  }

  private writePending(): Promise<void> {
    const producer = this.producer;
    this.producer = null;
    if (!producer) return Promise.resolve();

    return this.lock(async () => {
      const envelope = { version: STORE_VERSION, key: this.key, data: producer() };
      atomicWrite(this.filePath, JSON.stringify(envelope, null, 2));
      this.log.debug(`Saved ${this.filePath}`);
    });
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
