/**
 * Derive a stable identifier from a display name.
 * "Zoë Smith-Jones" → "zoe_smith_jones". Returns '' when nothing usable is left.
 */
export function generateSlug(name: string): string {
  return name
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}
