import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  DEFAULT_SAVE_DELAY_MS,
  ScaleCoordinator,
  type ScaleCoordinatorOptions,
} from '../src/coordinator.js';
import { GUEST_SLUG } from '../src/interfaces/body-metrics.js';
import { EVENT_GUEST_MEASUREMENT, EVENT_MEASUREMENT } from '../src/interfaces/event-sink.js';
import type { HistoryData } from '../src/interfaces/history-store.js';
import {
  MemorySensorSource,
  MemoryStore,
  RecordingSink,
  makeEntry,
  makePerson,
} from './helpers/fakes.js';

const NOW = new Date('2024-06-15T08:00:00.000Z');
const DAY_MS = 86_400_000;
const WEIGHT = 'sensor.scale_weight';
const IMPEDANCE = 'sensor.scale_impedance';

describe('ScaleCoordinator', () => {
  let sensors: MemorySensorSource;
  let store: MemoryStore;
  let sink: RecordingSink;

  function coordinator(
    overrides: Partial<ScaleCoordinatorOptions> = {},
    history: HistoryData | null = null,
  ): ScaleCoordinator {
    store = new MemoryStore(history);
    return new ScaleCoordinator({ entry: makeEntry(), sensors, store, events: sink, ...overrides });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(NOW);
    sensors = new MemorySensorSource();
    sink = new RecordingSink();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  // --- Measurement cycle ---

  describe('refresh', () => {
    it('derives the full snapshot for a matched reading', () => {
      sensors.set(WEIGHT, '70.2 kg');
      sensors.set(IMPEDANCE, '520');
      const c = coordinator();

      const data = c.refresh();

      expect(data.people).toEqual({
        alice: {
          weight: 70.2,
          impedance: 520,
          bmi: 22.9,
          confidence: 99.7,
          bmr: 1651,
          ideal_weight: 70.5,
          body_fat: 10.3,
          muscle_mass: 52.7,
          water_pct: 61.5,
          bone_mass: 2.9,
          visceral_fat: 28,
          body_type: 'Skinny-muscular',
          last_measurement: '2024-06-15T08:00:00.000Z',
          weight_trend_week: null,
          weight_trend_month: null,
        },
      });
      expect(c.data).toBe(data);
    });

    it('emits a measurement event with every non-null field', () => {
      sensors.set(WEIGHT, '70.2');
      sensors.set(IMPEDANCE, '520');
      coordinator().refresh();

      expect(sink.events).toEqual([
        {
          name: EVENT_MEASUREMENT,
          payload: {
            person: 'alice',
            entry_id: 'bathroom',
            weight: 70.2,
            impedance: 520,
            bmi: 22.9,
            confidence: 99.7,
            bmr: 1651,
            ideal_weight: 70.5,
            body_fat: 10.3,
            muscle_mass: 52.7,
            water_pct: 61.5,
            bone_mass: 2.9,
            visceral_fat: 28,
            body_type: 'Skinny-muscular',
            last_measurement: '2024-06-15T08:00:00.000Z',
          },
        },
      ]);
    });

    it('records new measurements in history and requests a debounced save', async () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      c.refresh();

      expect(c.historyFor('alice')).toEqual([
        { timestamp: '2024-06-15T08:00:00.000Z', weight: 70.2 },
      ]);
      expect(store.saveRequests).toBe(1);
      expect(store.lastDelayMs).toBe(DEFAULT_SAVE_DELAY_MS);

      await c.stop();
      expect(store.saved).toEqual({
        alice: [{ timestamp: '2024-06-15T08:00:00.000Z', weight: 70.2 }],
      });
    });

    it('does not repeat the event for an unchanged reading', () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      c.refresh();
      c.refresh();

      expect(sink.events).toHaveLength(1);
      expect(store.saveRequests).toBe(1);
      expect(c.historyFor('alice')).toHaveLength(1);
    });

    it('smooths consecutive readings', () => {
      sensors.set(WEIGHT, '70');
      const c = coordinator();
      c.refresh();
      sensors.set(WEIGHT, '72');
      const data = c.refresh();

      // 0.2·72 + 0.8·70
      expect(data.people.alice?.weight).toBe(70.4);
      expect(sink.events).toHaveLength(2);
    });

    it('leaves impedance metrics null without an impedance reading', () => {
      sensors.set(WEIGHT, '70.2');
      sensors.set(IMPEDANCE, 'unavailable');
      const data = coordinator().refresh();

      expect(data.people.alice).toMatchObject({
        weight: 70.2,
        impedance: null,
        bmi: 22.9,
        body_fat: null,
        muscle_mass: null,
        water_pct: null,
        bone_mass: null,
        visceral_fat: null,
        body_type: null,
      });
      const payload = sink.events[0]?.payload;
      expect(payload).not.toHaveProperty('impedance');
      expect(payload).not.toHaveProperty('body_fat');
      expect(payload).not.toHaveProperty('weight_trend_week');
    });

    it('works without an impedance sensor', () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator({ entry: makeEntry({ impedance_sensor: undefined }) });
      expect(c.refresh().people.alice?.impedance).toBeNull();
    });

    it.each([
      ['missing', undefined],
      ['unknown', 'unknown'],
      ['unavailable', 'unavailable'],
      ['not numeric', 'heavy'],
    ])('keeps the previous state when the weight is %s', (_label, state) => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      const before = c.refresh();

      if (state === undefined) sensors.remove(WEIGHT);
      else sensors.set(WEIGHT, state);

      expect(c.refresh()).toBe(before);
      expect(sink.events).toHaveLength(1);
    });

    it('returns empty data before the first reading', () => {
      expect(coordinator().refresh()).toEqual({ people: {} });
    });

    it('computes trends against loaded history', async () => {
      const weekAgo = new Date(NOW.getTime() - 7 * DAY_MS).toISOString();
      const c = coordinator({}, { alice: [{ timestamp: weekAgo, weight: 72 }] });
      await c.loadHistory();

      sensors.set(WEIGHT, '70.2');
      const snapshot = c.refresh().people.alice;

      expect(snapshot).toMatchObject({ weight_trend_week: -1.8, weight_trend_month: null });
      expect(sink.events[0]?.payload.weight_trend_week).toBe(-1.8);
    });

    it('notifies update listeners until they unsubscribe', () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      const listener = vi.fn();
      const unsubscribe = c.onUpdate(listener);

      c.refresh();
      expect(listener).toHaveBeenCalledWith(c.data);

      unsubscribe();
      c.refresh();
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('keeps notifying when a listener throws', () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      const second = vi.fn();
      c.onUpdate(() => {
        throw new Error('listener broke');
      });
      c.onUpdate(second);

      expect(() => c.refresh()).not.toThrow();
      expect(second).toHaveBeenCalledTimes(1);
    });
  });

  // --- Guests ---

  describe('guest readings', () => {
    it('records an unmatched reading as a guest', () => {
      sensors.set(WEIGHT, '95');
      sensors.set(IMPEDANCE, '450');
      const c = coordinator();
      const data = c.refresh();

      expect(data.people).toEqual({
        [GUEST_SLUG]: {
          weight: 95,
          impedance: 450,
          last_measurement: '2024-06-15T08:00:00.000Z',
        },
      });
      expect(c.hasGuestReading).toBe(true);
      expect(sink.events).toEqual([
        {
          name: EVENT_GUEST_MEASUREMENT,
          payload: {
            person: 'guest',
            entry_id: 'bathroom',
            weight: 95,
            impedance: 450,
            last_measurement: '2024-06-15T08:00:00.000Z',
          },
        },
      ]);
      expect(store.saveRequests).toBe(0);
    });

    it('emits the guest event again only when the weight changes', () => {
      sensors.set(WEIGHT, '95');
      const c = coordinator();
      c.refresh();
      c.refresh();
      expect(sink.events).toHaveLength(1);

      sensors.set(WEIGHT, '96');
      c.refresh();
      expect(sink.events).toHaveLength(2);
      expect(c.data.people[GUEST_SLUG]?.weight).toBe(96);
    });

    it('ignores readings of 10 kg or less', () => {
      sensors.set(WEIGHT, '10');
      const c = coordinator();
      expect(c.refresh()).toEqual({ people: {} });
      expect(c.hasGuestReading).toBe(false);
      expect(sink.events).toEqual([]);
    });

    it('ignores unmatched readings when guest detection is off', () => {
      sensors.set(WEIGHT, '95');
      const c = coordinator({ guestDetection: false });
      expect(c.guestEnabled).toBe(false);
      expect(c.refresh()).toEqual({ people: {} });
      expect(sink.events).toEqual([]);
    });

    it('keeps matched snapshots next to the guest', () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      c.refresh();
      sensors.set(WEIGHT, '95');
      expect(Object.keys(c.refresh().people)).toEqual(['alice', GUEST_SLUG]);
    });
  });

  describe('reassignGuest', () => {
    it('moves the guest reading to the person', () => {
      sensors.set(WEIGHT, '95');
      const c = coordinator();
      c.refresh();
      const listener = vi.fn();
      c.onUpdate(listener);

      expect(c.reassignGuest('alice')).toBe(true);

      expect(c.hasGuestReading).toBe(false);
      expect(Object.keys(c.data.people)).toEqual(['alice']);
      expect(c.data.people.alice).toMatchObject({ weight: 95, confidence: 62.5 });
      expect(c.historyFor('alice')).toEqual([
        { timestamp: '2024-06-15T08:00:00.000Z', weight: 95 },
      ]);
      expect(sink.events.map((e) => e.name)).toEqual([EVENT_GUEST_MEASUREMENT, EVENT_MEASUREMENT]);
      expect(store.saveRequests).toBe(1);
      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('records the reading even when it is close to the last one', () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator({
        entry: makeEntry({
          people: [makePerson({ name: 'Alice', expected_weight: 70.2, tolerance: 0.1 })],
        }),
      });
      c.refresh();
      // Score 0.15 is outside the tolerance; smoothed into Alice it moves only 0.02 kg
      sensors.set(WEIGHT, '70.3');
      c.refresh();
      expect(c.hasGuestReading).toBe(true);

      expect(c.reassignGuest('alice')).toBe(true);
      expect(c.historyFor('alice')).toHaveLength(2);
    });

    it('does not resurrect the reassigned reading on the next cycle', () => {
      sensors.set(WEIGHT, '95');
      const c = coordinator();
      c.refresh();
      c.reassignGuest('alice');

      c.refresh();
      expect(c.hasGuestReading).toBe(false);
      expect(c.data.people[GUEST_SLUG]).toBeUndefined();

      sensors.set(WEIGHT, '94');
      c.refresh();
      expect(c.hasGuestReading).toBe(true);
    });

    it('returns false for an unknown person', () => {
      sensors.set(WEIGHT, '95');
      const c = coordinator();
      c.refresh();
      expect(c.reassignGuest('bob')).toBe(false);
      expect(c.hasGuestReading).toBe(true);
    });

    it('returns false without a guest reading', () => {
      expect(coordinator().reassignGuest('alice')).toBe(false);
      expect(sink.events).toEqual([]);
    });
  });

  // --- Lifecycle ---

  describe('start / stop', () => {
    it('polls at the configured interval until stopped', async () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator({ pollIntervalMs: 1_000 });
      const listener = vi.fn();
      c.onUpdate(listener);

      await c.start();
      expect(listener).toHaveBeenCalledTimes(1);

      await vi.advanceTimersByTimeAsync(3_000);
      expect(listener).toHaveBeenCalledTimes(4);

      await c.stop();
      await vi.advanceTimersByTimeAsync(3_000);
      expect(listener).toHaveBeenCalledTimes(4);
    });

    it('loads history before the first cycle', async () => {
      const c = coordinator({}, { alice: [{ timestamp: '2024-06-01T08:00:00.000Z', weight: 71 }] });
      await c.start();
      expect(c.historyFor('alice')).toEqual([
        { timestamp: '2024-06-01T08:00:00.000Z', weight: 71 },
      ]);
      await c.stop();
    });

    it('flushes pending history on stop', async () => {
      sensors.set(WEIGHT, '70.2');
      const c = coordinator();
      await c.start();
      await c.stop();
      expect(store.writes).toBe(1);
      expect(store.saved?.alice).toHaveLength(1);
    });

    it('drops smoothing and guest state on stop', async () => {
      sensors.set(WEIGHT, '95');
      const c = coordinator({ pollIntervalMs: 1_000 });
      await c.start();
      sensors.set(WEIGHT, '70.2');
      await vi.advanceTimersByTimeAsync(1_000);
      expect(c.hasGuestReading).toBe(true);

      await c.stop();
      expect(c.hasGuestReading).toBe(false);

      // Seeded afresh rather than blended with 70.2
      sensors.set(WEIGHT, '72');
      await c.start();
      expect(c.data.people.alice?.weight).toBe(72);
      expect(sink.events.filter((e) => e.name === EVENT_MEASUREMENT)).toHaveLength(2);
      await c.stop();
    });

    it('exposes configured people', () => {
      const c = coordinator();
      expect(c.slugs).toEqual(['alice']);
      expect(c.hasPerson('alice')).toBe(true);
      expect(c.hasPerson('bob')).toBe(false);
    });

    it('refuses a person whose slug is the guest identity', () => {
      const entry = makeEntry({ people: [makePerson({ name: 'Guest' })] });
      expect(() => coordinator({ entry })).toThrow(
        "Person 'Guest' on scale 'bathroom' uses a reserved name",
      );
    });
  });
});
