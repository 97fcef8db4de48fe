import { writeFileSync, renameSync, unlinkSync, existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// --- Atomic file write ---

/**
 * Write content to a file atomically via tmp+rename, creating the parent
 * directory if needed. On Windows, `renameSync` fails if the target exists
 * (EPERM), so the target is unlinked first.
 */
export function atomicWrite(filePath: string, content: string): void {
  const tmpPath = filePath + '.tmp';
  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(tmpPath, content, 'utf8');
    if (existsSync(filePath)) {
      unlinkSync(filePath);
    }
    renameSync(tmpPath, filePath);
  } catch (err) {
    if (existsSync(tmpPath)) unlinkSync(tmpPath);
    throw err;
  }
}

// --- Write lock (async mutex) ---

export type WriteLock = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Serialize async operations via a promise chain. A failed operation
 * rejects its own caller but does not block the ones queued after it.
 */
export function createWriteLock(): WriteLock {
  let chain: Promise<void> = Promise.resolve();
  return <T>(fn: () => Promise<T>): Promise<T> => {
    const result = chain.then(fn, fn);
    chain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  };
}
