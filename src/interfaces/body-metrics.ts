export type Sex = 'male' | 'female';

export const BODY_TYPES = [
  'Obese',
  'Overweight',
  'Thick-set',
  'Lack of exercise',
  'Balanced',
  'Balanced-muscular',
  'Skinny',
  'Balanced-skinny',
  'Skinny-muscular',
] as const;

export type BodyType = (typeof BODY_TYPES)[number];

/** A single poll's decoded sensor values. */
export interface RawSample {
  weight: number;
  impedance: number | null;
}

/** Impedance-derived fields; all null when the scale reported no impedance. */
export interface BodyComposition {
  body_fat: number | null;
  muscle_mass: number | null;
  water_pct: number | null;
  bone_mass: number | null;
  visceral_fat: number | null;
  body_type: BodyType | null;
}

export interface MetricsSnapshot extends BodyComposition {
  weight: number;
  impedance: number | null;
  bmi: number;
  confidence: number;
  bmr: number;
  ideal_weight: number;
  /** ISO-8601 UTC. */
  last_measurement: string;
  weight_trend_week: number | null;
  weight_trend_month: number | null;
}

/** Identity of readings that matched nobody; no configured person may use this slug. */
export const GUEST_SLUG = 'guest';
export const GUEST_NAME = 'Guest';

/** Restricted snapshot exposed for readings that matched nobody. */
export type GuestSnapshot = Pick<MetricsSnapshot, 'weight' | 'impedance' | 'last_measurement'>;

export type PersonSnapshot = MetricsSnapshot | GuestSnapshot;

export type MetricKey = keyof MetricsSnapshot;
export type MetricValue = number | string | null;

export interface CoordinatorData {
  people: Record<string, PersonSnapshot>;
}

/** Look up one metric on a snapshot, null when the snapshot does not carry it. */
export function metricValue(snapshot: PersonSnapshot, key: MetricKey): MetricValue {
  const fields: Partial<Record<MetricKey, MetricValue>> = snapshot;
  return fields[key] ?? null;
}
