/**
 * Load .env BEFORE any other module initializes.
 * This must be the first import in index.ts.
 */
import { config } from 'dotenv';
import { fileURLToPath } from 'node:url';
import { dirname, join } from 'node:path';

export const ROOT: string = join(dirname(fileURLToPath(import.meta.url)), '..');

config({ path: join(ROOT, '.env') });

/** Config file location: CONFIG_PATH, else config.yaml at the project root. */
export function configPath(): string {
  return process.env.CONFIG_PATH || join(ROOT, 'config.yaml');
}
