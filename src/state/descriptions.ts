import { BODY_TYPES, type MetricKey } from '../interfaces/body-metrics.js';

export type MetricDeviceClass = 'weight' | 'enum' | 'timestamp';

/** Display metadata for one metric of the state surface. */
export interface MetricDescription {
  key: MetricKey;
  name: string;
  unit?: string;
  /** `enum` and `timestamp` values are not measurements and get no state class. */
  deviceClass?: MetricDeviceClass;
  icon?: string;
  precision?: number;
  options?: readonly string[];
}

export const METRIC_DESCRIPTIONS: readonly MetricDescription[] = [
  { key: 'weight', name: 'Weight', unit: 'kg', deviceClass: 'weight', precision: 2 },
  { key: 'impedance', name: 'Impedance', unit: 'Ω', icon: 'mdi:flash', precision: 0 },
  { key: 'bmi', name: 'BMI', unit: 'kg/m²', icon: 'mdi:human', precision: 1 },
  { key: 'body_fat', name: 'Body Fat', unit: '%', icon: 'mdi:percent', precision: 1 },
  { key: 'muscle_mass', name: 'Muscle Mass', unit: 'kg', deviceClass: 'weight', precision: 1 },
  { key: 'water_pct', name: 'Water', unit: '%', icon: 'mdi:water-percent', precision: 1 },
  { key: 'bone_mass', name: 'Bone Mass', unit: 'kg', deviceClass: 'weight', precision: 1 },
  { key: 'confidence', name: 'Match Confidence', unit: '%', icon: 'mdi:target', precision: 0 },
  { key: 'bmr', name: 'BMR', unit: 'kcal', icon: 'mdi:fire', precision: 0 },
  { key: 'visceral_fat', name: 'Visceral Fat', icon: 'mdi:stomach', precision: 0 },
  { key: 'ideal_weight', name: 'Ideal Weight', unit: 'kg', deviceClass: 'weight', precision: 1 },
  {
    key: 'body_type',
    name: 'Body Type',
    deviceClass: 'enum',
    icon: 'mdi:human-handsup',
    options: BODY_TYPES,
  },
  { key: 'last_measurement', name: 'Last Measurement', deviceClass: 'timestamp' },
  {
    key: 'weight_trend_week',
    name: 'Weight Trend (Week)',
    unit: 'kg',
    deviceClass: 'weight',
    icon: 'mdi:trending-up',
    precision: 1,
  },
  {
    key: 'weight_trend_month',
    name: 'Weight Trend (Month)',
    unit: 'kg',
    deviceClass: 'weight',
    icon: 'mdi:trending-up',
    precision: 1,
  },
];

// Compile-time check: fails if a field is added to MetricsSnapshot but not described here
const _describedKeys: Record<MetricKey, true> = {
  weight: true,
  impedance: true,
  bmi: true,
  body_fat: true,
  muscle_mass: true,
  water_pct: true,
  bone_mass: true,
  confidence: true,
  bmr: true,
  visceral_fat: true,
  ideal_weight: true,
  body_type: true,
  last_measurement: true,
  weight_trend_week: true,
  weight_trend_month: true,
};
void _describedKeys;

const GUEST_KEYS: ReadonlySet<MetricKey> = new Set<MetricKey>([
  'weight',
  'impedance',
  'last_measurement',
]);

export const GUEST_METRIC_DESCRIPTIONS: readonly MetricDescription[] = METRIC_DESCRIPTIONS.filter(
  (d) => GUEST_KEYS.has(d.key),
);
