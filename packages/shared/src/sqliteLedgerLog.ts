/**
 * @ledger-module: SqliteLedgerLog
 * @ledger-risk: high
 * @ledger-ethics: high
 * @ledger-scope: storage
 *
 * @description
 * Persists ledger entries to SQLite with retry/backoff handling. Entries are
 * keyed by their sequence number, so a second writer racing for the same
 * position fails on the primary key instead of forking the chain. Records are
 * re-validated when read back; a row that no longer decodes is returned as an
 * unreadable entry so the ledger can still load and report it.
 *
 * @impact
 * Risk: Storage errors or schema drift can break the audit trail.
 * Ethics: Consent and revocation history must survive restarts intact.
 */
import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import {
  assertValidConsentReceipt,
  assertValidRevocationRecord,
  type LedgerEntry,
  type StoredLedgerEntry
} from '@reciprocal/consent-core';
import type { LedgerLog } from './ledgerLog.js';
import { createModuleLogger } from './logger.js';

const BUSY_MAX_ATTEMPTS = 5;
const BUSY_RETRY_DELAY_MS = 50;

const sleep = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));
const ledgerLogLogger = createModuleLogger('sqliteLedgerLog');

type LedgerEntryRow = {
  seq: number;
  kind: string;
  record_hash: string;
  record_json: string;
  prev_entry_hash: string | null;
  entry_hash: string;
  appended_at: string;
};

export interface SqliteLedgerLogConfig {
  dbPath: string;
}

export class SqliteLedgerLog implements LedgerLog {
  private readonly db: Database.Database;
  private readonly insertEntry: Database.Statement;
  private readonly selectEntries: Database.Statement;
  readonly resolvedPath: string;

  constructor(config: SqliteLedgerLogConfig) {
    this.resolvedPath = path.resolve(config.dbPath);
    // Ensure the parent directory exists before opening the database.
    fs.mkdirSync(path.dirname(this.resolvedPath), { recursive: true });

    this.db = new Database(this.resolvedPath);
    this.db.pragma('journal_mode = WAL');

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ledger_entries (
        seq INTEGER PRIMARY KEY,
        kind TEXT NOT NULL CHECK (kind IN ('receipt', 'revocation')),
        record_hash TEXT NOT NULL,
        record_json TEXT NOT NULL,
        prev_entry_hash TEXT,
        entry_hash TEXT NOT NULL UNIQUE,
        appended_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_ledger_entries_record_hash ON ledger_entries (record_hash);
    `);

    this.insertEntry = this.db.prepare(`
      INSERT INTO ledger_entries (seq, kind, record_hash, record_json, prev_entry_hash, entry_hash, appended_at)
      VALUES (@seq, @kind, @record_hash, @record_json, @prev_entry_hash, @entry_hash, @appended_at)
    `);

    this.selectEntries = this.db.prepare(`
      SELECT seq, kind, record_hash, record_json, prev_entry_hash, entry_hash, appended_at
      FROM ledger_entries
      ORDER BY seq ASC
    `);

    ledgerLogLogger.info(`Initialized SQLite ledger log at ${this.resolvedPath}`);
  }

  private isBusyError(error: unknown): boolean {
    if (!error || typeof error !== 'object') {
      return false;
    }

    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    return code === 'SQLITE_BUSY' || code === 'SQLITE_LOCKED';
  }

  private async withRetry<T>(operation: () => T): Promise<T> {
    for (let attempt = 1; attempt <= BUSY_MAX_ATTEMPTS; attempt++) {
      try {
        return operation();
      } catch (error) {
        if (this.isBusyError(error) && attempt < BUSY_MAX_ATTEMPTS) {
          await sleep(BUSY_RETRY_DELAY_MS * attempt);
          continue;
        }
        throw error;
      }
    }

    throw new Error('Failed to execute SQLite operation after retries.');
  }

  private decodeRecord(row: LedgerEntryRow) {
    const source = `sqlite:ledger_entries#${row.seq}`;
    const record: unknown = JSON.parse(row.record_json);

    if (row.kind === 'receipt') {
      assertValidConsentReceipt(record, source);
      return { kind: 'receipt' as const, record };
    }

    if (row.kind === 'revocation') {
      assertValidRevocationRecord(record, source);
      return { kind: 'revocation' as const, record };
    }

    throw new Error(`Ledger entry ${row.seq} has unknown kind "${row.kind}".`);
  }

  private mapEntryRow(row: LedgerEntryRow): StoredLedgerEntry {
    const base = {
      seq: row.seq,
      recordHash: row.record_hash,
      prevEntryHash: row.prev_entry_hash,
      entryHash: row.entry_hash,
      appendedAt: row.appended_at
    };

    try {
      return { ...base, ...this.decodeRecord(row) };
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      ledgerLogLogger.error(`Ledger entry ${row.seq} could not be decoded: ${reason}`);
      return { ...base, kind: 'unreadable', storedKind: row.kind, rawRecord: row.record_json, reason };
    }
  }

  async readAll(): Promise<StoredLedgerEntry[]> {
    const rows = await this.withRetry(() => this.selectEntries.all() as LedgerEntryRow[]);
    return rows.map((row) => this.mapEntryRow(row));
  }

  async append(entry: LedgerEntry): Promise<void> {
    await this.withRetry(() =>
      this.insertEntry.run({
        seq: entry.seq,
        kind: entry.kind,
        record_hash: entry.recordHash,
        record_json: JSON.stringify(entry.record),
        prev_entry_hash: entry.prevEntryHash,
        entry_hash: entry.entryHash,
        appended_at: entry.appendedAt
      })
    );
    ledgerLogLogger.debug(`Ledger entry stored (seq=${entry.seq}, kind=${entry.kind})`);
  }

  close(): void {
    // Close the SQLite handle so temp databases can be deleted cleanly in tests.
    this.db.close();
  }
}
