import Database from 'better-sqlite3';
import { HistoryRecord, HistoryStore, HistoryStoreConfig, WriteRetryPolicy } from './types';
import { withWriteRetry } from './write-retry';
import { logger } from '../observability/logger';

export const UNKNOWN_CUSTOMER = 'unknown';

const CREATE_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    email TEXT NOT NULL,
    summary TEXT NOT NULL,
    timestamp DATETIME DEFAULT CURRENT_TIMESTAMP
  );
  CREATE INDEX IF NOT EXISTS idx_email ON history (email);
`;

/**
 * Lowercase and trim a customer email.
 * Returns undefined for a missing, empty or "unknown" customer.
 */
export function normalizeCustomerEmail(email: string | undefined): string | undefined {
  const normalized = (email ?? '').trim().toLowerCase();
  if (!normalized || normalized === UNKNOWN_CUSTOMER) return undefined;
  return normalized;
}

export function formatHistoryRecord(ticketId: string, summary: string): string {
  return `Issue ${ticketId} (Current): ${summary}`;
}

/**
 * Append-only customer history in a single SQLite file.
 *
 * The database handle is opened by the caller and injected; `close()` releases it.
 * If `initialize()` fails the store keeps running in a degraded mode where
 * every read and write reports the storage error as text.
 */
export class SqliteHistoryStore implements HistoryStore {
  private log = logger.child({ component: 'history-store' });

  constructor(
    private readonly db: Database.Database,
    private readonly retryPolicy: WriteRetryPolicy,
  ) {}

  /** Create the history table and email index if they do not exist yet. */
  initialize(): void {
    this.log.info({ dbPath: this.db.name }, 'Initializing history store');
    try {
      this.db.exec(CREATE_TABLE_SQL);
    } catch (err) {
      this.log.error({ err }, 'History store initialization failed; continuing without a usable table');
    }
  }

  /** All records for a customer, oldest first. Throws on storage errors. */
  listRecords(email: string): HistoryRecord[] {
    return this.db
      .prepare<[string], HistoryRecord>(
        'SELECT id, email, summary, timestamp FROM history WHERE email = ? ORDER BY timestamp ASC, id ASC',
      )
      .all(email);
  }

  lookup(email: string | undefined): string {
    const customer = normalizeCustomerEmail(email);
    if (!customer) {
      return 'No customer email provided. Cannot retrieve history.';
    }

    try {
      const records = this.listRecords(customer);
      if (records.length === 0) {
        return 'No past history found for this customer.';
      }
      return 'Found past customer history:\n' + records.map((r) => r.summary).join('\n');
    } catch (err) {
      this.log.error({ err }, 'History read failed');
      return `Error retrieving history: ${errorMessage(err)}`;
    }
  }

  async save(email: string | undefined, ticketId: string, summary: string): Promise<string> {
    const customer = normalizeCustomerEmail(email);
    if (!customer) {
      return 'No customer email provided. Cannot save history.';
    }

    const record = formatHistoryRecord(ticketId, summary);
    const log = this.log.child({ ticketId });

    try {
      await withWriteRetry(
        () =>
          this.db
            .prepare<[string, string]>(
              'INSERT INTO history (email, summary, timestamp) VALUES (?, ?, CURRENT_TIMESTAMP)',
            )
            .run(customer, record),
        this.retryPolicy,
        log,
      );
      log.info('History record saved');
      return `Successfully saved new history record for ${customer}.`;
    } catch (err) {
      log.error({ err }, 'History write failed');
      return `Error saving history: ${errorMessage(err)}`;
    }
  }

  /** Readiness check */
  ping(): boolean {
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
      this.log.info('History store closed');
    }
  }
}

/**
 * Stand-in used when the history file cannot be opened at all. The process
 * keeps serving; every history operation reports the open failure as text.
 */
export class UnavailableHistoryStore implements HistoryStore {
  private log = logger.child({ component: 'history-store' });

  constructor(private readonly cause: Error) {}

  initialize(): void {
    this.log.error({ err: this.cause }, 'History store unavailable; history reads and writes will fail');
  }

  listRecords(): HistoryRecord[] {
    throw this.cause;
  }

  lookup(email: string | undefined): string {
    if (!normalizeCustomerEmail(email)) {
      return 'No customer email provided. Cannot retrieve history.';
    }
    return `Error retrieving history: ${this.cause.message}`;
  }

  async save(email: string | undefined): Promise<string> {
    if (!normalizeCustomerEmail(email)) {
      return 'No customer email provided. Cannot save history.';
    }
    return `Error saving history: ${this.cause.message}`;
  }

  ping(): boolean {
    return false;
  }

  close(): void {
    // nothing was opened
  }
}

/**
 * Open the history file and wrap it in a store. Does not create the schema.
 * An open failure is logged and yields an UnavailableHistoryStore.
 */
export function openHistoryStore(config: HistoryStoreConfig): HistoryStore {
  let db: Database.Database;
  try {
    db = new Database(config.dbPath, { timeout: config.busyTimeoutMs });
  } catch (err) {
    const cause = err instanceof Error ? err : new Error(String(err));
    logger.child({ component: 'history-store' }).error({ err: cause, dbPath: config.dbPath }, 'Cannot open history database');
    return new UnavailableHistoryStore(cause);
  }
  return new SqliteHistoryStore(db, {
    maxAttempts: config.maxAttempts,
    delayMs: config.delayMs,
  });
}

/**
 * Longest a single save can take before it settles: every attempt may spend
 * the SQLite busy timeout, with the retry delay between attempts.
 */
export function worstCaseWriteMs(config: HistoryStoreConfig): number {
  const attempts = Math.max(1, config.maxAttempts);
  return attempts * config.busyTimeoutMs + (attempts - 1) * config.delayMs;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
