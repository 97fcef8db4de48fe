/**
 * Body-composition formulas (Mi Scale style BIA coefficients).
 *
 * Every function accepts arbitrary finite numbers and never throws: results
 * outside the physiological range are clamped, and non-positive weight or
 * height fall back to a neutral value.
 *
 * Bone and muscle mass use weight-relative clamping so that a light person
 * cannot be assigned a bone mass that only makes sense for a heavy one.
 */

import type { BodyComposition, BodyType, Sex } from '../interfaces/body-metrics.js';

export interface BodyProfile {
  heightCm: number;
  age: number;
  sex: Sex;
}

export function round(v: number, digits: number = 0): number {
  const f = 10 ** digits;
  return Math.round(v * f) / f;
}

export function clamp(v: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, v));
}

export function calcBmi(weight: number, heightCm: number): number {
  const heightM = heightCm / 100;
  if (heightM <= 0) return 0;
  return round(weight / (heightM * heightM), 1);
}

/** Lean body mass estimate, never more than 95% of body weight. */
export function leanBodyMassCoefficient(
  weight: number,
  heightCm: number,
  age: number,
  impedance: number,
): number {
  let lbm = ((heightCm * 9.058) / 100) * (heightCm / 100);
  lbm += weight * 0.32 + 12.226;
  lbm -= impedance * 0.0068;
  lbm -= age * 0.0542;
  return Math.min(lbm, weight * 0.95);
}

export function calcBodyFatPct(
  weight: number,
  heightCm: number,
  age: number,
  sex: Sex,
  impedance: number,
): number {
  if (weight <= 0) return 0;
  const lbm = leanBodyMassCoefficient(weight, heightCm, age, impedance);
  const coeff = sex === 'male' ? 0.055 : 0.025;
  const fat = (1 - ((lbm - ((impedance * coeff) / 100) * (30 - age)) / weight) * 1.1) * 100;
  return round(clamp(fat, 3, 60), 1);
}

export const BONE_MASS_LIMITS: Record<Sex, number> = { male: 5.1, female: 4.2 };

export function boneMassBounds(weight: number, sex: Sex): { min: number; max: number } {
  return {
    min: Math.max(0.1, weight * 0.01),
    max: Math.min(BONE_MASS_LIMITS[sex], weight * 0.15),
  };
}

export function calcBoneMass(
  weight: number,
  heightCm: number,
  age: number,
  sex: Sex,
  impedance: number,
): number {
  const lbm = leanBodyMassCoefficient(weight, heightCm, age, impedance);
  const base = sex === 'male' ? 0.18016894 : 0.245691014;
  let bone = -(base - lbm * 0.05158);
  bone += bone > 2.2 ? 0.1 : -0.1;

  // When the bounds cross (very low weight) the lower bound wins
  const { min, max } = boneMassBounds(weight, sex);
  return round(Math.max(min, Math.min(max, bone)), 1);
}

export function calcMuscleMass(
  weight: number,
  heightCm: number,
  age: number,
  sex: Sex,
  impedance: number,
): number {
  const fatPct = calcBodyFatPct(weight, heightCm, age, sex, impedance);
  const bone = calcBoneMass(weight, heightCm, age, sex, impedance);
  const muscle = weight - (fatPct / 100) * weight - bone;
  return round(Math.max(weight * 0.25, Math.min(weight * 0.75, muscle)), 1);
}

/** Mifflin-St Jeor. */
export function calcBmr(weight: number, heightCm: number, age: number, sex: Sex): number {
  const bmr = 10 * weight + 6.25 * heightCm - 5 * age + (sex === 'male' ? 5 : -161);
  return round(Math.max(0, bmr));
}

/** Visceral fat rating on the 1–59 scale. */
export function calcVisceralFat(weight: number, heightCm: number, age: number, sex: Sex): number {
  if (heightCm <= 0) return 1;

  const base = weight * 0.74 - heightCm * 0.082 + 13.95;
  let vf = base * (sex === 'male' ? 0.55 : 0.44);
  if (age > 30) vf += (age - 30) * (sex === 'male' ? 0.1 : 0.07);

  return round(clamp(vf, 1, 59));
}

/** Devine formula. */
export function calcIdealWeight(heightCm: number, sex: Sex): number {
  const heightIn = heightCm / 2.54;
  const ideal = (sex === 'male' ? 50 : 45.5) + 2.3 * (heightIn - 60);
  return round(Math.max(0, ideal), 1);
}

export function calcWaterPct(
  weight: number,
  heightCm: number,
  age: number,
  sex: Sex,
  impedance: number,
): number {
  const fatPct = calcBodyFatPct(weight, heightCm, age, sex, impedance);
  let water = (100 - fatPct) * 0.7;
  water *= water > 50 ? 0.98 : 1.02;
  return round(clamp(water, 5, 80), 1);
}

interface BodyTypeThresholds {
  fatLow: number;
  fatHigh: number;
  muscleLow: number;
  muscleHigh: number;
}

const BODY_TYPE_THRESHOLDS: Record<Sex, BodyTypeThresholds> = {
  male: { fatLow: 15, fatHigh: 25, muscleLow: 0.38, muscleHigh: 0.46 },
  female: { fatLow: 22, fatHigh: 32, muscleLow: 0.3, muscleHigh: 0.37 },
};

// Rows: high / mid / low fat. Columns: low / mid / high muscle ratio.
const BODY_TYPE_TABLE: readonly (readonly [BodyType, BodyType, BodyType])[] = [
  ['Obese', 'Overweight', 'Thick-set'],
  ['Lack of exercise', 'Balanced', 'Balanced-muscular'],
  ['Skinny', 'Balanced-skinny', 'Skinny-muscular'],
];

export function getBodyType(
  bodyFatPct: number,
  muscleMass: number,
  weight: number,
  sex: Sex,
): BodyType {
  if (weight <= 0) return 'Balanced';

  const t = BODY_TYPE_THRESHOLDS[sex];
  const ratio = muscleMass / weight;

  const row = bodyFatPct > t.fatHigh ? 0 : bodyFatPct >= t.fatLow ? 1 : 2;
  const col = ratio >= t.muscleHigh ? 2 : ratio >= t.muscleLow ? 1 : 0;
  return BODY_TYPE_TABLE[row][col];
}

const NO_COMPOSITION: BodyComposition = {
  body_fat: null,
  muscle_mass: null,
  water_pct: null,
  bone_mass: null,
  visceral_fat: null,
  body_type: null,
};

/** Impedance-dependent metrics; all null without an impedance reading. */
export function computeBodyComposition(
  weight: number,
  impedance: number | null,
  p: BodyProfile,
): BodyComposition {
  if (impedance === null) return { ...NO_COMPOSITION };

  const fat = calcBodyFatPct(weight, p.heightCm, p.age, p.sex, impedance);
  const muscle = calcMuscleMass(weight, p.heightCm, p.age, p.sex, impedance);

  return {
    body_fat: fat,
    muscle_mass: muscle,
    water_pct: calcWaterPct(weight, p.heightCm, p.age, p.sex, impedance),
    bone_mass: calcBoneMass(weight, p.heightCm, p.age, p.sex, impedance),
    visceral_fat: calcVisceralFat(weight, p.heightCm, p.age, p.sex),
    body_type: getBodyType(fat, muscle, weight, p.sex),
  };
}
