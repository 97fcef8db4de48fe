import { round } from '../metrics/calculations.js';
import type { HistoryData, HistoryEntry } from '../interfaces/history-store.js';

export const MAX_HISTORY_ENTRIES = 365;

const DAY_MS = 86_400_000;

/** Append-only, per-person weight log with week/month trend lookups. */
export class WeightHistory {
  private readonly entries = new Map<string, HistoryEntry[]>();

  constructor(data?: HistoryData | null) {
    if (data) this.replace(data);
  }

  replace(data: HistoryData): void {
    this.entries.clear();
    for (const [slug, list] of Object.entries(data)) {
      this.entries.set(slug, list.slice(-MAX_HISTORY_ENTRIES));
    }
  }

  append(slug: string, weight: number, at: Date): HistoryEntry {
    const entry: HistoryEntry = { timestamp: at.toISOString(), weight: round(weight, 2) };
    const list = this.entries.get(slug) ?? [];
    list.push(entry);
    if (list.length > MAX_HISTORY_ENTRIES) {
      list.splice(0, list.length - MAX_HISTORY_ENTRIES);
    }
    this.entries.set(slug, list);
    return entry;
  }

  get(slug: string): readonly HistoryEntry[] {
    return this.entries.get(slug) ?? [];
  }

  /**
   * Weight change against the entry closest to `days` ago. Null when there is
   * no history, or when the closest entry is younger than half the period.
   */
  trend(slug: string, currentWeight: number, days: number, now: Date): number | null {
    const list = this.entries.get(slug);
    if (!list || list.length === 0) return null;

    const target = now.getTime() - days * DAY_MS;
    let best: HistoryEntry | null = null;
    let bestTime = 0;
    let bestDelta = Infinity;

    for (const entry of list) {
      const ts = Date.parse(entry.timestamp);
      if (Number.isNaN(ts)) continue;
      const delta = Math.abs(ts - target);
      if (delta < bestDelta) {
        best = entry;
        bestTime = ts;
        bestDelta = delta;
      }
    }

    if (best === null) return null;
    if (now.getTime() - bestTime < days * DAY_MS * 0.5) return null;

    return round(currentWeight - best.weight, 1);
  }

  toJSON(): HistoryData {
    const out: HistoryData = {};
    for (const [slug, list] of this.entries) {
      out[slug] = list.map((e) => ({ ...e }));
    }
    return out;
  }
}
