export type SensorStatus = 'ok' | 'unknown' | 'unavailable' | 'missing';

export interface SensorState {
  status: SensorStatus;
  /** Last raw state string, null when the entity has never reported. */
  rawValue: string | null;
}

/** Non-blocking lookup of an entity's current state. */
export interface SensorSource {
  read(entityId: string): SensorState;
}
