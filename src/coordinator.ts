import { createLogger, type Logger } from './logger.js';
import { errMsg } from './utils/error.js';
import { parseNumericState } from './utils/parse.js';
import { generateSlug } from './config/slugify.js';
import type { PersonConfig, ScaleEntryConfig } from './config/schema.js';
import {
  calcBmi,
  calcBmr,
  calcIdealWeight,
  computeBodyComposition,
  round,
} from './metrics/calculations.js';
import { matchPerson, scoreSample, confidenceFromScore } from './matching/person-matcher.js';
import { SampleSmoother } from './history/smoothing.js';
import { NewMeasurementDetector } from './history/change-detector.js';
import { WeightHistory } from './history/weight-history.js';
import type { SensorSource } from './interfaces/sensor-source.js';
import type { DataStore, HistoryData, HistoryEntry } from './interfaces/history-store.js';
import {
  EVENT_GUEST_MEASUREMENT,
  EVENT_MEASUREMENT,
  type EventPayload,
  type EventSink,
} from './interfaces/event-sink.js';
import {
  GUEST_SLUG,
  type CoordinatorData,
  type GuestSnapshot,
  type MetricsSnapshot,
  type RawSample,
} from './interfaces/body-metrics.js';

export const DEFAULT_POLL_INTERVAL_MS = 2_000;
export const DEFAULT_SAVE_DELAY_MS = 60_000;

/** Unmatched readings at or below this are treated as noise, not a guest. */
export const GUEST_MIN_WEIGHT_KG = 10;

const TREND_WEEK_DAYS = 7;
const TREND_MONTH_DAYS = 30;

export interface ScaleCoordinatorOptions {
  entry: ScaleEntryConfig;
  sensors: SensorSource;
  store: DataStore<HistoryData>;
  events: EventSink;
  pollIntervalMs?: number;
  saveDelayMs?: number;
  guestDetection?: boolean;
}

interface GuestReading {
  sample: RawSample;
  at: Date;
}

export type UpdateListener = (data: CoordinatorData) => void;

/**
 * Owns one scale entry: polls its sensors, attributes each reading to a
 * person, smooths it, derives body metrics and keeps the weight history.
 *
 * A tick never throws for missing or malformed sensor data; it keeps the
 * previous snapshots instead.
 */
export class ScaleCoordinator {
  readonly entry: ScaleEntryConfig;

  private readonly log: Logger;
  private readonly sensors: SensorSource;
  private readonly store: DataStore<HistoryData>;
  private readonly events: EventSink;
  private readonly pollIntervalMs: number;
  private readonly saveDelayMs: number;
  private readonly guestDetection: boolean;

  private readonly smoother = new SampleSmoother();
  private readonly detector = new NewMeasurementDetector();
  private readonly guestDetector = new NewMeasurementDetector();
  private readonly history = new WeightHistory();
  private readonly people = new Map<string, PersonConfig>();
  private readonly listeners = new Set<UpdateListener>();

  private current: CoordinatorData = { people: {} };
  private guest: GuestReading | null = null;
  private reassignedGuest: RawSample | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private running = false;

  constructor(opts: ScaleCoordinatorOptions) {
    this.entry = opts.entry;
    this.sensors = opts.sensors;
    this.store = opts.store;
    this.events = opts.events;
    this.pollIntervalMs = opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.saveDelayMs = opts.saveDelayMs ?? DEFAULT_SAVE_DELAY_MS;
    this.guestDetection = opts.guestDetection ?? true;
    this.log = createLogger('Scale').child(opts.entry.id);

    for (const person of opts.entry.people) {
      const slug = generateSlug(person.name);
      if (slug === GUEST_SLUG) {
        throw new Error(`Person '${person.name}' on scale '${opts.entry.id}' uses a reserved name`);
      }
      this.people.set(slug, person);
    }
  }

  get data(): CoordinatorData {
    return this.current;
  }

  get slugs(): string[] {
    return [...this.people.keys()];
  }

  hasPerson(slug: string): boolean {
    return this.people.has(slug);
  }

  get guestEnabled(): boolean {
    return this.guestDetection;
  }

  get hasGuestReading(): boolean {
    return this.guest !== null;
  }

  historyFor(slug: string): readonly HistoryEntry[] {
    return this.history.get(slug);
  }

  onUpdate(listener: UpdateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  // --- Lifecycle ---

  async loadHistory(): Promise<void> {
    const data = await this.store.load();
    this.history.replace(data ?? {});
    const count = Object.keys(data ?? {}).length;
    this.log.debug(`Loaded weight history for ${count} person(s)`);
  }

  /** Load history, run a first refresh, then poll until stop(). */
  async start(): Promise<void> {
    if (this.running) return;
    await this.loadHistory();
    this.running = true;
    this.log.info(
      `Polling ${this.entry.weight_sensor}` +
        (this.entry.impedance_sensor ? ` + ${this.entry.impedance_sensor}` : '') +
        ` every ${this.pollIntervalMs / 1000}s for ${this.people.size} person(s)`,
    );
    this.tick();
  }

  /** Stop polling, write any pending history and drop in-memory smoothing and guest state. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.store.flush();
    this.smoother.clear();
    this.detector.clear();
    this.guestDetector.clear();
    this.guest = null;
    this.reassignedGuest = null;
  }

  private tick(): void {
    try {
      this.refresh();
    } catch (err) {
      this.log.error(`Refresh failed: ${errMsg(err)}`);
    }
    if (this.running) {
      this.timer = setTimeout(() => this.tick(), this.pollIntervalMs);
    }
  }

  // --- Measurement cycle ---

  /** Run one measurement cycle and return the resulting snapshots. */
  refresh(): CoordinatorData {
    const sample = this.readSample();
    if (!sample) return this.current;

    const match = matchPerson(this.entry.people, sample);
    const now = new Date();

    if (match.person === null) {
      if (this.recordGuest(sample, now)) this.notify();
      return this.current;
    }

    this.reassignedGuest = null;
    this.applyMatch(match.person, sample, match.confidence, now, false);
    this.notify();
    return this.current;
  }

  private readSample(): RawSample | null {
    const weight = this.readNumber(this.entry.weight_sensor, 'weight');
    if (weight === null) return null;

    const impedance = this.entry.impedance_sensor
      ? this.readNumber(this.entry.impedance_sensor, 'impedance')
      : null;

    return { weight, impedance };
  }

  private readNumber(entityId: string, label: string): number | null {
    const state = this.sensors.read(entityId);
    if (state.status !== 'ok' || state.rawValue === null) {
      this.log.debug(`${label} sensor ${entityId} is ${state.status}`);
      return null;
    }
    const value = parseNumericState(state.rawValue);
    if (value === null) {
      this.log.debug(`Cannot parse ${label} state: ${state.rawValue}`);
    }
    return value;
  }

  private applyMatch(
    person: PersonConfig,
    sample: RawSample,
    confidence: number,
    now: Date,
    forceRecord: boolean,
  ): void {
    const slug = generateSlug(person.name);
    const smoothed = this.smoother.update(slug, sample);
    const w = smoothed.weight;
    const profile = { heightCm: person.height_cm, age: person.age, sex: person.sex };

    const isNew = this.detector.check(slug, w) || forceRecord;
    if (forceRecord) this.detector.record(slug, w);
    if (isNew) {
      this.history.append(slug, w, now);
      this.store.saveDebounced(() => this.history.toJSON(), this.saveDelayMs);
    }

    const snapshot: MetricsSnapshot = {
      weight: round(w, 2),
      impedance: smoothed.impedance !== null ? round(smoothed.impedance, 1) : null,
      bmi: calcBmi(w, person.height_cm),
      confidence: round(confidence, 1),
      bmr: calcBmr(w, person.height_cm, person.age, person.sex),
      ideal_weight: calcIdealWeight(person.height_cm, person.sex),
      ...computeBodyComposition(w, smoothed.impedance, profile),
      last_measurement: now.toISOString(),
      weight_trend_week: this.history.trend(slug, w, TREND_WEEK_DAYS, now),
      weight_trend_month: this.history.trend(slug, w, TREND_MONTH_DAYS, now),
    };

    this.current = { people: { ...this.current.people, [slug]: snapshot } };

    if (isNew) {
      this.log.info(`New measurement for ${person.name}: ${snapshot.weight} kg`);
      this.events.emit(EVENT_MEASUREMENT, {
        person: slug,
        entry_id: this.entry.id,
        ...nonNullFields(snapshot),
      });
    }
  }

  // --- Guests ---

  /** Returns true when the guest snapshot changed. */
  private recordGuest(sample: RawSample, now: Date): boolean {
    if (!this.guestDetection || sample.weight <= GUEST_MIN_WEIGHT_KG) return false;

    // The scale keeps showing a reading after it was reassigned; don't resurrect it
    if (this.reassignedGuest && sameSample(this.reassignedGuest, sample)) return false;
    this.reassignedGuest = null;

    this.guest = { sample, at: now };

    const snapshot: GuestSnapshot = {
      weight: round(sample.weight, 2),
      impedance: sample.impedance !== null ? round(sample.impedance, 1) : null,
      last_measurement: now.toISOString(),
    };
    this.current = { people: { ...this.current.people, [GUEST_SLUG]: snapshot } };

    if (this.guestDetector.check(GUEST_SLUG, sample.weight)) {
      this.log.info(`Unrecognized reading of ${snapshot.weight} kg recorded as guest`);
      this.events.emit(EVENT_GUEST_MEASUREMENT, {
        person: GUEST_SLUG,
        entry_id: this.entry.id,
        ...nonNullFields(snapshot),
      });
    }
    return true;
  }

  /**
   * Attribute the latest guest reading to a person: it is smoothed into their
   * state and recorded in their history as a new measurement.
   * Returns false when the person is unknown or there is no guest reading.
   */
  reassignGuest(slug: string): boolean {
    const person = this.people.get(slug);
    if (!person) {
      this.log.warn(`Cannot reassign guest reading: no person '${slug}' on this scale`);
      return false;
    }
    const guest = this.guest;
    if (!guest) {
      this.log.warn(`No guest reading to reassign to ${person.name}`);
      return false;
    }

    const confidence = confidenceFromScore(scoreSample(guest.sample, person));
    this.applyMatch(person, guest.sample, confidence, new Date(), true);

    const { [GUEST_SLUG]: _removed, ...people } = this.current.people;
    this.current = { people };
    this.guest = null;
    this.reassignedGuest = guest.sample;

    const kg = round(guest.sample.weight, 2);
    this.log.info(`Reassigned guest reading of ${kg} kg to ${person.name}`);
    this.notify();
    return true;
  }

  private notify(): void {
    for (const listener of this.listeners) {
      try {
        listener(this.current);
      } catch (err) {
        this.log.error(`Update listener failed: ${errMsg(err)}`);
      }
    }
  }
}

function nonNullFields(snapshot: MetricsSnapshot | GuestSnapshot): EventPayload {
  const out: EventPayload = {};
  for (const [k, v] of Object.entries(snapshot)) {
    if (typeof v === 'number' || typeof v === 'string') out[k] = v;
  }
  return out;
}

function sameSample(a: RawSample, b: RawSample): boolean {
  return a.weight === b.weight && a.impedance === b.impedance;
}
