/** Convert an unknown caught value to a human-readable error message. */
export function errMsg(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export type ServiceErrorCode = 'no_entries' | 'entry_not_found' | 'invalid_payload';

/**
 * Raised by control operations when the caller asked for something that
 * cannot be done. Never raised by the measurement cycle itself.
 */
export class ServiceValidationError extends Error {
  readonly code: ServiceErrorCode;

  constructor(code: ServiceErrorCode, message: string) {
    super(message);
    this.name = 'ServiceValidationError';
    this.code = code;
  }
}
