/**
 * @description: In-process ledger log for tests and ephemeral deployments.
 * @ledger-scope: storage
 * @ledger-module: MemoryLedgerLog
 * @ledger-risk: moderate - Entries vanish with the process.
 * @ledger-ethics: moderate - Not suitable where consent must outlive a restart.
 */
import type { LedgerEntry, StoredLedgerEntry } from '@reciprocal/consent-core';
import { cloneLedgerEntry, type LedgerLog } from './ledgerLog.js';

export class MemoryLedgerLog implements LedgerLog {
  private readonly entries: StoredLedgerEntry[] = [];

  constructor(seed: readonly StoredLedgerEntry[] = []) {
    for (const entry of seed) {
      this.entries.push(cloneLedgerEntry(entry));
    }
  }

  async readAll(): Promise<StoredLedgerEntry[]> {
    return this.entries.map((entry) => cloneLedgerEntry(entry));
  }

  async append(entry: LedgerEntry): Promise<void> {
    if (entry.seq !== this.entries.length) {
      throw new Error(`Ledger entry seq ${entry.seq} does not follow log length ${this.entries.length}.`);
    }
    this.entries.push(cloneLedgerEntry(entry));
  }

  get size(): number {
    return this.entries.length;
  }

  close(): void {
    // Nothing to release.
  }
}
