export const NEW_MEASUREMENT_THRESHOLD_KG = 0.1;

/**
 * Decides whether a smoothed weight is a new measurement: the first one for a
 * person, or one that moved strictly more than the threshold since the last.
 */
export class NewMeasurementDetector {
  private readonly lastMatched = new Map<string, number>();

  constructor(private readonly thresholdKg: number = NEW_MEASUREMENT_THRESHOLD_KG) {}

  /** Returns true and remembers `weight` when it counts as a new measurement. */
  check(slug: string, weight: number): boolean {
    const prev = this.lastMatched.get(slug);
    if (prev !== undefined && Math.abs(weight - prev) <= this.thresholdKg) return false;
    this.lastMatched.set(slug, weight);
    return true;
  }

  /** Remember `weight` unconditionally, e.g. for a manually attributed reading. */
  record(slug: string, weight: number): void {
    this.lastMatched.set(slug, weight);
  }

  clear(): void {
    this.lastMatched.clear();
  }
}
