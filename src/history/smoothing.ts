import type { RawSample } from '../interfaces/body-metrics.js';

export const EMA_ALPHA = 0.2;

/** Exponential moving average step. */
export function ema(raw: number, previous: number, alpha: number = EMA_ALPHA): number {
  return alpha * raw + (1 - alpha) * previous;
}

interface SmoothedValues {
  weight: number;
  impedance?: number;
}

/**
 * Per-person EMA of weight and impedance. Each series is seeded with the
 * first raw value seen for that person. Kept in memory only.
 */
export class SampleSmoother {
  private readonly state = new Map<string, SmoothedValues>();
  private readonly alpha: number;

  constructor(alpha: number = EMA_ALPHA) {
    this.alpha = alpha;
  }

  /**
   * Feed a raw sample and return the smoothed one. A sample without
   * impedance yields a null smoothed impedance but keeps the running value.
   */
  update(slug: string, sample: RawSample): RawSample {
    const prev = this.state.get(slug);
    const weight = ema(sample.weight, prev?.weight ?? sample.weight, this.alpha);
    const next: SmoothedValues = { weight };

    let impedance: number | null = null;
    if (sample.impedance !== null) {
      impedance = ema(sample.impedance, prev?.impedance ?? sample.impedance, this.alpha);
      next.impedance = impedance;
    } else if (prev?.impedance !== undefined) {
      next.impedance = prev.impedance;
    }

    this.state.set(slug, next);
    return { weight, impedance };
  }

  clear(): void {
    this.state.clear();
  }
}
