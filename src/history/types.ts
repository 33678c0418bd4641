/** A saved support interaction. Rows are never updated or deleted. */
export interface HistoryRecord {
  id: number;
  email: string;
  summary: string;
  /** SQLite `CURRENT_TIMESTAMP` text (UTC, second resolution) */
  timestamp: string;
}

export interface WriteRetryPolicy {
  /** Total write attempts, including the first */
  maxAttempts: number;
  /** Fixed wait between attempts */
  delayMs: number;
}

export interface HistoryStoreConfig extends WriteRetryPolicy {
  dbPath: string;
  /**
   * How long SQLite itself waits on a locked file before reporting SQLITE_BUSY.
   * better-sqlite3 spins on the calling thread for this long, so keep it at or
   * near 0 and let the awaited write retry do the waiting.
   */
  busyTimeoutMs: number;
}

/**
 * Customer history, keyed by normalized email.
 * `lookup` and `save` return text meant for the model and never throw.
 */
export interface HistoryStore {
  initialize(): void;
  /** All records for a normalized email, oldest first. Throws on storage errors. */
  listRecords(email: string): HistoryRecord[];
  lookup(email: string | undefined): string;
  save(email: string | undefined, ticketId: string, summary: string): Promise<string>;
  ping(): boolean;
  close(): void;
}
