/**
 * @description: Durable append-only storage contract for ledger entries.
 * @ledger-scope: storage
 * @ledger-module: LedgerLog
 * @ledger-risk: high - A log that reorders or drops entries breaks tamper evidence.
 * @ledger-ethics: high - The log is the only durable record of consent decisions.
 */
import type { LedgerEntry, StoredLedgerEntry } from '@reciprocal/consent-core';

export interface LedgerLog {
  /** Every stored entry in sequence order; rows that fail to decode come back unreadable. */
  readAll(): Promise<StoredLedgerEntry[]>;
  /** Durably stores one entry; entry.seq must equal the current length. */
  append(entry: LedgerEntry): Promise<void>;
  close(): void;
}

/** Deep copy so callers can never mutate what the log holds. */
export const cloneLedgerEntry = <T extends StoredLedgerEntry>(entry: T): T => structuredClone(entry);
