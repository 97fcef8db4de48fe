const LEADING_NUMBER_REGEX = /^\s*([-+]?\d*\.?\d+)/;

/**
 * Parse the leading number of a sensor state, ignoring any unit suffix:
 * "75.5 kg" → 75.5, "-3" → -3, "kg" → null.
 */
export function parseNumericState(value: string): number | null {
  const match = LEADING_NUMBER_REGEX.exec(value);
  if (!match) return null;
  const num = Number(match[1]);
  return Number.isFinite(num) ? num : null;
}
