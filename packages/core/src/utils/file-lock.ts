import lockfile from 'proper-lockfile';
import { SinkLockError } from '../errors.js';

/**
 * Options for file lock acquisition.
 */
export interface LockOptions {
  /** Number of retry attempts (default: 2) */
  retries?: number;
  /** Minimum timeout between retries in ms (default: 50) */
  minTimeout?: number;
  /** Maximum timeout between retries in ms (default: 500) */
  maxTimeout?: number;
  /** Lock stale threshold in ms (default: 10000) */
  stale?: number;
}

/** Releases a held lock. Safe to call more than once. */
export type ReleaseLock = () => Promise<void>;

const DEFAULT_LOCK_OPTIONS: Required<LockOptions> = {
  retries: 2,
  minTimeout: 50,
  maxTimeout: 500,
  stale: 10_000,
};

/**
 * Acquire an exclusive lock on `filePath` and keep it until released.
 * The file itself need not exist; proper-lockfile keeps a `<file>.lock`
 * directory beside it and refreshes it while held.
 *
 * @throws {SinkLockError} If the lock cannot be acquired after retries
 */
export async function acquireFileLock(
  filePath: string,
  options?: LockOptions,
): Promise<ReleaseLock> {
  const opts = { ...DEFAULT_LOCK_OPTIONS, ...options };
  let release: () => Promise<void>;

  try {
    release = await lockfile.lock(filePath, {
      realpath: false,
      retries: {
        retries: opts.retries,
        minTimeout: opts.minTimeout,
        maxTimeout: opts.maxTimeout,
      },
      stale: opts.stale,
    });
  } catch (err) {
    throw new SinkLockError(
      `Could not acquire lock on ${filePath} after ${opts.retries} retries: ${err instanceof Error ? err.message : String(err)}`,
      filePath,
    );
  }

  let released = false;
  return async () => {
    if (released) return;
    released = true;
    await release();
  };
}
