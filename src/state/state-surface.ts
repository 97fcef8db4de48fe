import { generateSlug } from '../config/slugify.js';
import type { ScaleCoordinator } from '../coordinator.js';
import {
  GUEST_NAME,
  GUEST_SLUG,
  metricValue,
  type MetricKey,
  type MetricValue,
} from '../interfaces/body-metrics.js';
import type { RestoreData } from '../storage/schemas.js';
import {
  GUEST_METRIC_DESCRIPTIONS,
  METRIC_DESCRIPTIONS,
  type MetricDescription,
} from './descriptions.js';

/** One addressable (person, metric) value. */
export interface StateEntity {
  uniqueId: string;
  entryId: string;
  slug: string;
  personName: string;
  description: MetricDescription;
}

// Entry ids, slugs and metric keys never contain '-', so the joined ids stay unambiguous

export function stateDeviceId(entryId: string, slug: string): string {
  return `${entryId}-${slug}`;
}

export function stateUniqueId(entryId: string, slug: string, key: MetricKey): string {
  return `${stateDeviceId(entryId, slug)}-${key}`;
}

/** A restored value is only trusted when it still fits the metric's type. */
function restoredValue(
  description: MetricDescription,
  raw: number | string | undefined,
): MetricValue {
  if (raw === undefined) return null;
  switch (description.deviceClass) {
    case 'timestamp':
      return typeof raw === 'string' && !Number.isNaN(Date.parse(raw)) ? raw : null;
    case 'enum':
      return typeof raw === 'string' && (description.options ?? []).includes(raw) ? raw : null;
    default:
      return typeof raw === 'number' && Number.isFinite(raw) ? raw : null;
  }
}

/**
 * Per-person metric values of one scale entry. Until the coordinator has a
 * value for a metric, the value restored from the previous run is served.
 */
export class StateSurface {
  readonly entities: readonly StateEntity[];
  private readonly restored = new Map<string, MetricValue>();

  constructor(
    private readonly coordinator: ScaleCoordinator,
    restore: RestoreData = {},
  ) {
    const entryId = coordinator.entry.id;
    const entities: StateEntity[] = [];

    for (const person of coordinator.entry.people) {
      const slug = generateSlug(person.name);
      for (const description of METRIC_DESCRIPTIONS) {
        const uniqueId = stateUniqueId(entryId, slug, description.key);
        entities.push({ uniqueId, entryId, slug, personName: person.name, description });
      }
    }

    if (coordinator.guestEnabled) {
      for (const description of GUEST_METRIC_DESCRIPTIONS) {
        const uniqueId = stateUniqueId(entryId, GUEST_SLUG, description.key);
        entities.push({ uniqueId, entryId, slug: GUEST_SLUG, personName: GUEST_NAME, description });
      }
    }

    for (const entity of entities) {
      const value = restoredValue(entity.description, restore[entity.uniqueId]);
      if (value !== null) this.restored.set(entity.uniqueId, value);
    }

    this.entities = entities;
  }

  get entryId(): string {
    return this.coordinator.entry.id;
  }

  /** Slugs in entity order, each once. */
  get slugs(): string[] {
    return [...new Set(this.entities.map((e) => e.slug))];
  }

  value(entity: StateEntity): MetricValue {
    const snapshot = this.coordinator.data.people[entity.slug];
    const live = snapshot ? metricValue(snapshot, entity.description.key) : null;
    return live ?? this.restored.get(entity.uniqueId) ?? null;
  }

  /** Current values of one person keyed by metric. */
  values(slug: string): Partial<Record<MetricKey, MetricValue>> {
    const out: Partial<Record<MetricKey, MetricValue>> = {};
    for (const entity of this.entities) {
      if (entity.slug === slug) out[entity.description.key] = this.value(entity);
    }
    return out;
  }

  /** Every non-null value keyed by unique id, for the restore file. */
  toRestoreData(): RestoreData {
    const out: RestoreData = {};
    for (const entity of this.entities) {
      const value = this.value(entity);
      if (value !== null) out[entity.uniqueId] = value;
    }
    return out;
  }
}
