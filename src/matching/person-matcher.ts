import { createLogger } from '../logger.js';
import type { PersonConfig } from '../config/schema.js';
import type { RawSample } from '../interfaces/body-metrics.js';

const log = createLogger('PersonMatch');

const WEIGHT_FACTOR = 1.5;
const IMPEDANCE_FACTOR = 0.02;

// --- Types ---

export type MatchResult =
  | { person: PersonConfig; score: number; confidence: number }
  | { person: null };

// --- Scoring ---

/**
 * Distance between a sample and a person's expected values.
 * The impedance term only applies to people with an expected impedance;
 * a sample without impedance is compared as 0 Ω.
 */
export function scoreSample(sample: RawSample, person: PersonConfig): number {
  const dw = Math.abs(sample.weight - person.expected_weight);
  const di =
    person.expected_impedance !== undefined
      ? Math.abs((sample.impedance ?? 0) - person.expected_impedance)
      : 0;
  return dw * WEIGHT_FACTOR + di * IMPEDANCE_FACTOR;
}

export function confidenceFromScore(score: number): number {
  return Math.max(0, Math.min(100, 100 - score));
}

// --- Main matching ---

/**
 * Pick the person with the lowest score among those whose score is below
 * their own tolerance. Ties keep the earlier person in configuration order.
 */
export function matchPerson(people: readonly PersonConfig[], sample: RawSample): MatchResult {
  let best: PersonConfig | null = null;
  let bestScore = Infinity;

  for (const person of people) {
    const score = scoreSample(sample, person);
    if (score < person.tolerance && score < bestScore) {
      best = person;
      bestScore = score;
    }
  }

  if (best === null) {
    log.debug(`No person matches ${sample.weight} kg`);
    return { person: null };
  }

  return { person: best, score: bestScore, confidence: confidenceFromScore(bestScore) };
}
