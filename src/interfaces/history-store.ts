export interface HistoryEntry {
  /** ISO-8601 UTC. */
  timestamp: string;
  /** kg, 2 decimals. */
  weight: number;
}

/** Weight history keyed by person slug. */
export type HistoryData = Record<string, HistoryEntry[]>;

/** Durable storage for one JSON document with coalesced writes. */
export interface DataStore<T> {
  /** Stored document, or null on first run. */
  load(): Promise<T | null>;
  /**
   * Write `producer()` once `delayMs` passes without another request.
   * Requests made while a write is pending only push the deadline back.
   */
  saveDebounced(producer: () => T, delayMs: number): void;
  /** Write any pending document now. */
  flush(): Promise<void>;
}
