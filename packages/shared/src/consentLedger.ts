/**
 * @ledger-module: ConsentLedger
 * @ledger-risk: high
 * @ledger-ethics: critical
 * @ledger-scope: core
 *
 * @description
 * Receipt store, revocation engine and verification API over an append-only
 * ledger log. Mutations run one at a time through a SerialQueue and only
 * touch in-memory indexes after the durable append resolves, synchronously,
 * so readers never see a half-applied entry and never wait on a writer.
 * Subject and grantor identifiers are pseudonymized before they are logged.
 *
 * @impact
 * Risk: Ordering or validation bugs break the hash chain or admit forged consent.
 * Ethics: Answers whether a use of someone's data is covered by consent they gave and did not withdraw.
 */
import {
  ConsentLedgerError,
  assertValidConsentReceipt,
  assertValidRevocationRecord,
  computeConsentStatus,
  findMissingScopes,
  hashEntry,
  hashReceipt,
  hashRevocation,
  parseInstant,
  receiptBody,
  verifyReceiptSignature,
  verifyRevocationSignature,
  type ChainFailure,
  type ChainVerification,
  type ConsentReceipt,
  type ConsentStatus,
  type InstantInput,
  type LedgerEntry,
  type LedgerEntryBase,
  type LedgerSummary,
  type RevocationRecord,
  type ScopeVerification,
  type StoredLedgerEntry
} from '@reciprocal/consent-core';
import type { LedgerLog } from './ledgerLog.js';
import { createModuleLogger } from './logger.js';
import { pseudonymLabel, shortHash } from './pseudonymization.js';
import { SerialQueue } from './serialQueue.js';

const ledgerLogger = createModuleLogger('consentLedger');

const describeInvalidRecord = (check: () => void): string | null => {
  try {
    check();
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
};

export type SubjectReceipt = {
  receiptHash: string;
  receipt: ConsentReceipt;
  status: ConsentStatus;
  revokedAt: string | null;
};

export interface ConsentLedgerOptions {
  log: LedgerLog;
  pseudonymizationSecret: string;
  now?: () => Date;
}

export class ConsentLedger {
  private readonly log: LedgerLog;
  private readonly now: () => Date;
  private readonly pseudonymizationSecret: string;
  private readonly writer = new SerialQueue();

  private readonly entryList: StoredLedgerEntry[] = [];
  private readonly receipts = new Map<string, ConsentReceipt>();
  private readonly revocations = new Map<string, RevocationRecord>();
  private readonly subjectChains = new Map<string, string[]>();
  private readonly grantorKeys = new Map<string, string>();

  private constructor(options: ConsentLedgerOptions) {
    if (!options.pseudonymizationSecret || options.pseudonymizationSecret.trim().length === 0) {
      throw new Error('pseudonymizationSecret is required to initialize ConsentLedger.');
    }
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
    this.pseudonymizationSecret = options.pseudonymizationSecret.trim();
  }

  /**
   * Replays the stored log into memory. A chain that fails verification is
   * still loaded so operators can inspect it; the failure is logged.
   */
  static async open(options: ConsentLedgerOptions): Promise<ConsentLedger> {
    const ledger = new ConsentLedger(options);
    const entries = await ledger.log.readAll();
    for (const entry of entries) {
      ledger.applyEntry(entry);
    }

    const verification = ledger.verifyChain();
    if (!verification.ok) {
      const first = verification.failures[0];
      ledgerLogger.error(
        `Ledger chain failed verification on load (${verification.failures.length} failures, first at seq=${first?.seq}: ${first?.reason})`
      );
    } else {
      ledgerLogger.info(`Ledger loaded (entries=${entries.length}, anchor=${shortHash(verification.anchor ?? '') || 'none'})`);
    }
    return ledger;
  }

  // --- Receipt store ---

  /**
   * Appends a signed receipt and returns its hash. The receipt's prevHash
   * must name the subject's newest receipt (or be null for a first grant).
   */
  append(receipt: unknown): Promise<string> {
    return this.writer.run(async () => {
      assertValidConsentReceipt(receipt, 'append');
      const receiptHash = hashReceipt(receipt);

      if (this.receipts.has(receiptHash)) {
        throw new ConsentLedgerError('DUPLICATE_RECEIPT', `Receipt ${receiptHash} already exists.`);
      }

      if (!verifyReceiptSignature(receipt)) {
        throw new ConsentLedgerError('INVALID_SIGNATURE', 'Receipt signature does not verify against grantorKey.');
      }

      const pinnedKey = this.grantorKeys.get(receipt.grantorId);
      if (pinnedKey !== undefined && pinnedKey !== receipt.grantorKey) {
        throw new ConsentLedgerError('INVALID_SIGNATURE', 'Receipt is signed with a key other than the grantor\'s registered key.');
      }

      const head = this.latest(receipt.subjectId);
      if (receipt.prevHash !== head) {
        throw new ConsentLedgerError(
          'CHAIN_MISMATCH',
          `Receipt prevHash ${receipt.prevHash ?? 'null'} does not match subject head ${head ?? 'null'}.`
        );
      }

      // Persist exactly the signed fields.
      const stored: ConsentReceipt = { ...receiptBody(receipt), signature: receipt.signature };
      const entry = this.buildEntry({ kind: 'receipt', record: stored }, receiptHash, this.now().toISOString());
      await this.log.append(entry);
      this.applyEntry(entry);

      ledgerLogger.info(
        `Receipt appended (receipt=${shortHash(receiptHash)}, subject=${this.label(receipt.subjectId, 'subject')}, `
        + `grantor=${this.label(receipt.grantorId, 'grantor')}, seq=${entry.seq})`
      );
      return receiptHash;
    });
  }

  get(receiptHash: string): ConsentReceipt {
    const receipt = this.receipts.get(receiptHash);
    if (!receipt) {
      throw new ConsentLedgerError('NOT_FOUND', `Receipt ${receiptHash} not found.`);
    }
    return structuredClone(receipt);
  }

  has(receiptHash: string): boolean {
    return this.receipts.has(receiptHash);
  }

  /** Newest receipt hash in the subject's chain, or null before the first grant. */
  latest(subjectId: string): string | null {
    const chain = this.subjectChains.get(subjectId);
    return chain && chain.length > 0 ? chain[chain.length - 1] : null;
  }

  history(subjectId: string, at: InstantInput = this.now()): SubjectReceipt[] {
    const instant = parseInstant(at, 'at');
    const chain = this.subjectChains.get(subjectId) ?? [];
    return chain.map((receiptHash) => {
      const receipt = this.requireReceipt(receiptHash);
      const revocation = this.revocations.get(receiptHash);
      return {
        receiptHash,
        receipt: structuredClone(receipt),
        status: computeConsentStatus(receipt, revocation ? [revocation] : [], instant),
        revokedAt: revocation?.revokedAt ?? null
      };
    });
  }

  // --- Revocation engine ---

  revoke(receiptHash: string, signature: string): Promise<RevocationRecord> {
    return this.writer.run(async () => {
      const receipt = this.receipts.get(receiptHash);
      if (!receipt) {
        throw new ConsentLedgerError('UNKNOWN_RECEIPT', `Cannot revoke unknown receipt ${receiptHash}.`);
      }

      if (!verifyRevocationSignature(receiptHash, signature, receipt.grantorKey)) {
        throw new ConsentLedgerError('INVALID_SIGNATURE', 'Revocation signature does not match the original grantor key.');
      }

      if (this.revocations.has(receiptHash)) {
        throw new ConsentLedgerError('ALREADY_REVOKED', `Receipt ${receiptHash} is already revoked.`);
      }

      const revokedAt = this.now().toISOString();
      const revocation: RevocationRecord = { receiptHash, revokedAt, signature };
      const entry = this.buildEntry({ kind: 'revocation', record: revocation }, hashRevocation(revocation), revokedAt);
      await this.log.append(entry);
      this.applyEntry(entry);

      ledgerLogger.info(
        `Receipt revoked (receipt=${shortHash(receiptHash)}, subject=${this.label(receipt.subjectId, 'subject')}, seq=${entry.seq})`
      );
      return { ...revocation };
    });
  }

  revocationFor(receiptHash: string): RevocationRecord | null {
    const revocation = this.revocations.get(receiptHash);
    return revocation ? { ...revocation } : null;
  }

  // --- Verification API ---

  status(receiptHash: string, at: InstantInput = this.now()): ConsentStatus {
    const receipt = this.receipts.get(receiptHash);
    if (!receipt) {
      throw new ConsentLedgerError('UNKNOWN_RECEIPT', `Receipt ${receiptHash} is not in the ledger.`);
    }

    const instant = parseInstant(at, 'at');
    const revocation = this.revocations.get(receiptHash);
    return computeConsentStatus(receipt, revocation ? [revocation] : [], instant);
  }

  verify(receiptHash: string, requiredScopes: readonly string[], at: InstantInput = this.now()): ScopeVerification {
    const instant = parseInstant(at, 'at');
    const status = this.status(receiptHash, instant);
    const missingScopes = findMissingScopes(this.requireReceipt(receiptHash).scope, requiredScopes);

    return {
      receiptHash,
      at: instant.toISOString(),
      status,
      valid: status === 'active' && missingScopes.length === 0,
      missingScopes
    };
  }

  anchor(): string | null {
    return this.entryList.length > 0 ? this.entryList[this.entryList.length - 1].entryHash : null;
  }

  entries(): StoredLedgerEntry[] {
    return this.entryList.map((entry) => structuredClone(entry));
  }

  summary(): LedgerSummary {
    return {
      receiptsIssued: this.receipts.size,
      revocations: this.revocations.size,
      anchoredEntries: this.entryList.length,
      subjects: this.subjectChains.size,
      anchor: this.anchor()
    };
  }

  /**
   * Walks every entry from the genesis link, recomputing entry and record
   * hashes, signatures, subject links and revocation targets.
   */
  verifyChain(): ChainVerification {
    const failures: ChainFailure[] = [];
    const seenReceipts = new Map<string, ConsentReceipt>();
    const seenRevocations = new Set<string>();
    const subjectHeads = new Map<string, string>();
    let previousEntryHash: string | null = null;

    this.entryList.forEach((entry, index) => {
      const fail = (reason: string) => failures.push({ seq: entry.seq, reason });

      if (entry.seq !== index) {
        fail(`expected seq ${index}`);
      }
      if (entry.prevEntryHash !== previousEntryHash) {
        fail('prevEntryHash does not link to the preceding entry');
      }
      const expectedEntryHash = hashEntry({
        seq: entry.seq,
        kind: entry.kind === 'unreadable' ? entry.storedKind : entry.kind,
        recordHash: entry.recordHash,
        prevEntryHash: entry.prevEntryHash,
        appendedAt: entry.appendedAt
      });
      if (entry.entryHash !== expectedEntryHash) {
        fail('entryHash does not match entry contents');
      }
      previousEntryHash = entry.entryHash;

      if (entry.kind === 'unreadable') {
        fail(`record could not be decoded: ${entry.reason}`);
        return;
      }

      if (entry.kind === 'receipt') {
        const receipt = entry.record;
        const malformed = describeInvalidRecord(() => assertValidConsentReceipt(receipt, `entry#${entry.seq}`));
        if (malformed !== null) {
          fail(malformed);
          return;
        }
        if (entry.recordHash !== hashReceipt(receipt)) {
          fail('recordHash does not match receipt contents');
        }
        if (seenReceipts.has(entry.recordHash)) {
          fail('duplicate receipt');
        }
        if (!verifyReceiptSignature(receipt)) {
          fail('receipt signature does not verify');
        }
        if (receipt.prevHash !== (subjectHeads.get(receipt.subjectId) ?? null)) {
          fail('receipt prevHash does not match the subject chain');
        }
        seenReceipts.set(entry.recordHash, receipt);
        subjectHeads.set(receipt.subjectId, entry.recordHash);
        return;
      }

      const revocation = entry.record;
      const malformed = describeInvalidRecord(() => assertValidRevocationRecord(revocation, `entry#${entry.seq}`));
      if (malformed !== null) {
        fail(malformed);
        return;
      }
      if (entry.recordHash !== hashRevocation(revocation)) {
        fail('recordHash does not match revocation contents');
      }
      const target = seenReceipts.get(revocation.receiptHash);
      if (!target) {
        fail('revocation references an unknown receipt');
        return;
      }
      if (!verifyRevocationSignature(revocation.receiptHash, revocation.signature, target.grantorKey)) {
        fail('revocation signature does not verify');
      }
      if (seenRevocations.has(revocation.receiptHash)) {
        fail('receipt revoked twice');
      }
      seenRevocations.add(revocation.receiptHash);
    });

    return {
      ok: failures.length === 0,
      length: this.entryList.length,
      anchor: this.anchor(),
      failures
    };
  }

  /** Waits for queued writes, then releases the underlying log. */
  async close(): Promise<void> {
    await this.writer.onIdle();
    this.log.close();
  }

  // --- Internals ---

  private buildEntry(
    payload: { kind: 'receipt'; record: ConsentReceipt } | { kind: 'revocation'; record: RevocationRecord },
    recordHash: string,
    appendedAt: string
  ): LedgerEntry {
    const seq = this.entryList.length;
    const prevEntryHash = this.anchor();
    const base: LedgerEntryBase = {
      seq,
      recordHash,
      prevEntryHash,
      appendedAt,
      entryHash: hashEntry({ seq, kind: payload.kind, recordHash, prevEntryHash, appendedAt })
    };
    return payload.kind === 'receipt'
      ? { ...base, kind: 'receipt', record: structuredClone(payload.record) }
      : { ...base, kind: 'revocation', record: { ...payload.record } };
  }

  private applyEntry(entry: StoredLedgerEntry): void {
    this.entryList.push(entry);

    // Kept for sequence and anchor only; verifyChain reports it.
    if (entry.kind === 'unreadable') {
      return;
    }

    if (entry.kind === 'receipt') {
      const receipt = entry.record;
      this.receipts.set(entry.recordHash, receipt);
      const chain = this.subjectChains.get(receipt.subjectId) ?? [];
      chain.push(entry.recordHash);
      this.subjectChains.set(receipt.subjectId, chain);
      if (!this.grantorKeys.has(receipt.grantorId)) {
        this.grantorKeys.set(receipt.grantorId, receipt.grantorKey);
      }
      return;
    }

    this.revocations.set(entry.record.receiptHash, entry.record);
  }

  private requireReceipt(receiptHash: string): ConsentReceipt {
    const receipt = this.receipts.get(receiptHash);
    if (!receipt) {
      throw new ConsentLedgerError('UNKNOWN_RECEIPT', `Receipt ${receiptHash} is not in the ledger.`);
    }
    return receipt;
  }

  private label(id: string, namespace: 'subject' | 'grantor'): string {
    return pseudonymLabel(id, this.pseudonymizationSecret, namespace);
  }
}
