import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import {
  normalizeCustomerEmail,
  openHistoryStore,
  SqliteHistoryStore,
  UnavailableHistoryStore,
  worstCaseWriteMs,
} from '../../src/history/history-store';
import { HistoryStore } from '../../src/history/types';
import { PolicyService } from '../../src/knowledge/policy-service';
import { ToolRegistry, registerSupportTools } from '../../src/tools/registry';
import { ToolRuntime } from '../../src/tools/runtime';
import { makeTempDir, removeDir } from '../helpers';

describe('normalizeCustomerEmail', () => {
  it('should trim and lowercase', () => {
    expect(normalizeCustomerEmail('  Jane@Example.COM ')).toBe('jane@example.com');
  });

  it.each([[undefined], [''], ['   '], ['Unknown'], ['unknown']])('should treat %p as no customer', (email) => {
    expect(normalizeCustomerEmail(email)).toBeUndefined();
  });
});

describe('SqliteHistoryStore', () => {
  let dir: string;
  let dbPath: string;
  let store: HistoryStore;

  const open = (overrides: { busyTimeoutMs?: number; maxAttempts?: number; delayMs?: number } = {}) =>
    openHistoryStore({
      dbPath,
      busyTimeoutMs: overrides.busyTimeoutMs ?? 0,
      maxAttempts: overrides.maxAttempts ?? 5,
      delayMs: overrides.delayMs ?? 1,
    });

  beforeEach(() => {
    dir = makeTempDir('history-');
    dbPath = path.join(dir, 'history.db');
    store = open();
    store.initialize();
  });

  afterEach(() => {
    store.close();
    removeDir(dir);
  });

  describe('initialize', () => {
    it('should create the history table and email index', () => {
      const db = new Database(dbPath, { readonly: true });
      const names = db
        .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type IN ('table', 'index') ORDER BY name")
        .all()
        .map((row) => row.name);
      db.close();

      expect(names).toEqual(expect.arrayContaining(['history', 'idx_email']));
    });

    it('should be safe to run again on an existing database', () => {
      expect(() => store.initialize()).not.toThrow();
      expect(store.lookup('nobody@example.com')).toBe('No past history found for this customer.');
    });
  });

  describe('lookup', () => {
    it('should refuse a missing email without touching storage', () => {
      const closedDb = new Database(':memory:');
      closedDb.close();
      const offline = new SqliteHistoryStore(closedDb, { maxAttempts: 1, delayMs: 0 });

      expect(offline.lookup('')).toBe('No customer email provided. Cannot retrieve history.');
      expect(offline.lookup(undefined)).toBe('No customer email provided. Cannot retrieve history.');
      expect(offline.lookup('Unknown')).toBe('No customer email provided. Cannot retrieve history.');
    });

    it('should report a customer without history', () => {
      expect(store.lookup('new@example.com')).toBe('No past history found for this customer.');
    });

    it('should return saved summaries for the normalized email', async () => {
      await store.save('Jane@Example.com', 'TICKET_AB12CD34', 'Lost package');

      expect(store.lookup('jane@example.com')).toBe(
        'Found past customer history:\nIssue TICKET_AB12CD34 (Current): Lost package',
      );
    });

    it('should list records oldest first by timestamp', () => {
      const db = new Database(dbPath);
      const insert = db.prepare('INSERT INTO history (email, summary, timestamp) VALUES (?, ?, ?)');
      insert.run('ana@example.com', 'third', '2024-03-03 10:00:00');
      insert.run('ana@example.com', 'first', '2024-01-01 10:00:00');
      insert.run('ana@example.com', 'second', '2024-02-02 10:00:00');
      db.close();

      expect(store.lookup('ana@example.com')).toBe('Found past customer history:\nfirst\nsecond\nthird');
    });

    it('should keep save order for records written within the same second', async () => {
      await store.save('ana@example.com', 'TICKET_1', 'one');
      await store.save('ana@example.com', 'TICKET_2', 'two');
      await store.save('ana@example.com', 'TICKET_3', 'three');

      expect(store.listRecords('ana@example.com').map((r) => r.summary)).toEqual([
        'Issue TICKET_1 (Current): one',
        'Issue TICKET_2 (Current): two',
        'Issue TICKET_3 (Current): three',
      ]);
    });
  });

  describe('save', () => {
    it('should refuse a missing email', async () => {
      await expect(store.save(undefined, 'TICKET_X', 'summary')).resolves.toBe(
        'No customer email provided. Cannot save history.',
      );
      await expect(store.save('unknown', 'TICKET_X', 'summary')).resolves.toBe(
        'No customer email provided. Cannot save history.',
      );
      expect(store.listRecords('unknown')).toEqual([]);
    });

    it('should store the normalized email, the labelled summary and a server timestamp', async () => {
      const result = await store.save('Jane@Example.com', 'TICKET_AB12CD34', 'Lost package');

      expect(result).toBe('Successfully saved new history record for jane@example.com.');
      const [record] = store.listRecords('jane@example.com');
      expect(record.email).toBe('jane@example.com');
      expect(record.summary).toBe('Issue TICKET_AB12CD34 (Current): Lost package');
      expect(record.timestamp).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    });

    it('should keep customers apart', async () => {
      await store.save('a@example.com', 'TICKET_A', 'for a');
      await store.save('b@example.com', 'TICKET_B', 'for b');

      expect(store.lookup('a@example.com')).toBe('Found past customer history:\nIssue TICKET_A (Current): for a');
      expect(store.lookup('b@example.com')).toBe('Found past customer history:\nIssue TICKET_B (Current): for b');
    });

    it('should persist across reopening the file', async () => {
      await store.save('jane@example.com', 'TICKET_AB12CD34', 'Lost package');
      store.close();

      store = open();
      store.initialize();

      expect(store.lookup('JANE@example.com')).toBe(
        'Found past customer history:\nIssue TICKET_AB12CD34 (Current): Lost package',
      );
    });
  });

  describe('write contention', () => {
    let locker: Database.Database;

    beforeEach(() => {
      locker = new Database(dbPath);
    });

    afterEach(() => {
      if (locker.inTransaction) locker.exec('ROLLBACK');
      locker.close();
    });

    it('should succeed once a concurrent writer releases the lock', async () => {
      store.close();
      store = open({ delayMs: 40 });

      locker.exec('BEGIN EXCLUSIVE');
      const pending = store.save('jane@example.com', 'TICKET_LOCKED1', 'Waited for lock');
      setTimeout(() => locker.exec('COMMIT'), 60);

      await expect(pending).resolves.toBe('Successfully saved new history record for jane@example.com.');
      expect(store.lookup('jane@example.com')).toBe(
        'Found past customer history:\nIssue TICKET_LOCKED1 (Current): Waited for lock',
      );
    });

    it('should report a lock that outlasts every attempt', async () => {
      locker.exec('BEGIN EXCLUSIVE');

      await expect(store.save('jane@example.com', 'TICKET_LOCKED2', 'Never written')).resolves.toBe(
        'Error saving history: Database locked after retries',
      );

      locker.exec('ROLLBACK');
      expect(store.lookup('jane@example.com')).toBe('No past history found for this customer.');
    });

    it('should keep the event loop running and finish the save inside the tool runtime', async () => {
      store.close();
      const config = { dbPath, busyTimeoutMs: 0, maxAttempts: 5, delayMs: 40 };
      store = openHistoryStore(config);
      const registry = registerSupportTools(new ToolRegistry(), {
        historyStore: store,
        policyService: PolicyService.fromDirectory(),
        saveTimeoutMs: worstCaseWriteMs(config) + 1000,
      });
      const runtime = new ToolRuntime(registry, { timeoutMs: 30 });

      let ticks = 0;
      const ticker = setInterval(() => ticks++, 10);
      locker.exec('BEGIN EXCLUSIVE');
      setTimeout(() => locker.exec('COMMIT'), 60);

      const result = await runtime.execute(
        'save_customer_history',
        { email: 'jane@example.com', ticket_id: 'TICKET_LOCKED3', summary: 'Saved after contention' },
        { conversationId: 'conv-lock', requestId: 'req-lock' },
      );
      clearInterval(ticker);

      expect(result).toEqual({
        success: true,
        output: 'Successfully saved new history record for jane@example.com.',
      });
      expect(ticks).toBeGreaterThanOrEqual(3);
      expect(store.listRecords('jane@example.com').map((r) => r.summary)).toEqual([
        'Issue TICKET_LOCKED3 (Current): Saved after contention',
      ]);
    });
  });

  describe('worstCaseWriteMs', () => {
    it('should add the busy timeout per attempt and the delay between attempts', () => {
      expect(worstCaseWriteMs({ dbPath, busyTimeoutMs: 0, maxAttempts: 5, delayMs: 500 })).toBe(2000);
      expect(worstCaseWriteMs({ dbPath, busyTimeoutMs: 100, maxAttempts: 3, delayMs: 50 })).toBe(400);
    });
  });

  describe('degraded mode', () => {
    it('should keep running after a failed initialize and report storage errors as text', async () => {
      const readonlyPath = path.join(dir, 'readonly.db');
      fs.writeFileSync(readonlyPath, '');
      const degraded = new SqliteHistoryStore(new Database(readonlyPath, { readonly: true }), {
        maxAttempts: 5,
        delayMs: 1,
      });

      expect(() => degraded.initialize()).not.toThrow();
      expect(degraded.lookup('jane@example.com')).toBe('Error retrieving history: no such table: history');
      await expect(degraded.save('jane@example.com', 'TICKET_X', 'summary')).resolves.toBe(
        'Error saving history: no such table: history',
      );

      degraded.close();
    });

    it('should report an unopenable file as text instead of throwing', async () => {
      const unavailable = openHistoryStore({
        dbPath: path.join(dir, 'missing-dir', 'nested', 'history.db'),
        busyTimeoutMs: 0,
        maxAttempts: 5,
        delayMs: 1,
      });

      expect(unavailable).toBeInstanceOf(UnavailableHistoryStore);
      expect(() => unavailable.initialize()).not.toThrow();
      expect(unavailable.ping()).toBe(false);
      expect(unavailable.lookup('jane@example.com')).toBe(
        'Error retrieving history: Cannot open database because the directory does not exist',
      );
      await expect(unavailable.save('jane@example.com', 'TICKET_X', 'summary')).resolves.toBe(
        'Error saving history: Cannot open database because the directory does not exist',
      );
      expect(unavailable.lookup('')).toBe('No customer email provided. Cannot retrieve history.');
      expect(() => unavailable.close()).not.toThrow();
    });
  });

  describe('ping', () => {
    it('should report an open database as healthy and a closed one as not', () => {
      expect(store.ping()).toBe(true);
      store.close();
      expect(store.ping()).toBe(false);
    });
  });
});
