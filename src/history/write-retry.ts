import type { Logger } from 'pino';
import { WriteRetryPolicy } from './types';
import { logger } from '../observability/logger';

export class LockRetriesExhaustedError extends Error {
  constructor(readonly attempts: number) {
    super('Database locked after retries');
    this.name = 'LockRetriesExhaustedError';
  }
}

/**
 * True when a write failed only because another connection holds the file lock.
 * better-sqlite3 reports these as SqliteError with an SQLITE_BUSY* / SQLITE_LOCKED* code.
 */
export function isTransientLockError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = 'code' in err ? err.code : undefined;
  if (typeof code === 'string' && (code.startsWith('SQLITE_BUSY') || code.startsWith('SQLITE_LOCKED'))) {
    return true;
  }
  return err.message.toLowerCase().includes('database is locked');
}

/**
 * Run a synchronous write, retrying lock contention with a fixed, non-blocking wait.
 *
 * Start → attempt → success | lock (wait, attempt again, up to maxAttempts) | fatal.
 * Non-lock errors are rethrown at once; running out of attempts throws
 * LockRetriesExhaustedError.
 */
export async function withWriteRetry<T>(
  write: () => T,
  policy: WriteRetryPolicy,
  log: Logger = logger,
): Promise<T> {
  const maxAttempts = Math.max(1, policy.maxAttempts);

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return write();
    } catch (err) {
      if (!isTransientLockError(err)) throw err;

      log.warn({ attempt, maxAttempts }, 'History store locked; retrying write');
      if (attempt < maxAttempts) {
        await delay(policy.delayMs);
      }
    }
  }

  throw new LockRetriesExhaustedError(maxAttempts);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
