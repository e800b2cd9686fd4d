/**
 * @description Defines the consent receipt model, revocations, derived status and ledger entries.
 * @ledger-scope interface
 * @ledger-module ConsentCoreTypes
 * @ledger-risk: low - Type drift can break downstream assumptions or validations.
 * @ledger-ethics: high - These shapes are the durable record of what a person agreed to.
 */

/**
 * ConsentStatus is derived on demand and never stored.
 * - active: issued, not revoked, not past its expiry
 * - expired: past expiresAt with no revocation in force
 * - revoked: a revocation was recorded at or before the instant asked about
 */
export type ConsentStatus = "active" | "expired" | "revoked";

/**
 * The signed portion of a receipt. The receipt hash is computed over this
 * body alone, so identical content always yields the same hash.
 */
export type ReceiptBody = {
    subjectId: string;
    grantorId: string;
    grantorKey: string;         // Ed25519 public key, base64 SPKI DER
    scope: string[];            // Sorted, de-duplicated, never empty
    issuedAt: string;           // ISO 8601
    expiresAt: string | null;   // ISO 8601
    prevHash: string | null;    // Previous receipt in the subject's chain
}

export type ConsentReceipt = ReceiptBody & {
    signature: string;          // base64 Ed25519 signature over the canonical body
}

/**
 * Terminal record for a receipt. revokedAt is stamped by the ledger clock.
 */
export type RevocationRecord = {
    receiptHash: string;
    revokedAt: string;
    signature: string;
}

export type LedgerEntryKind = "receipt" | "revocation";

export type LedgerEntry =
    | LedgerEntryBase & { kind: "receipt"; record: ConsentReceipt }
    | LedgerEntryBase & { kind: "revocation"; record: RevocationRecord };

/**
 * A stored entry whose record could not be read back. It keeps its place in
 * the sequence so chain verification reports it instead of the ledger
 * refusing to load.
 */
export type UnreadableLedgerEntry = LedgerEntryBase & {
    kind: "unreadable";
    storedKind: string;
    rawRecord: string;
    reason: string;
}

export type StoredLedgerEntry = LedgerEntry | UnreadableLedgerEntry;

export type LedgerEntryBase = {
    seq: number;
    recordHash: string;
    prevEntryHash: string | null;
    entryHash: string;
    appendedAt: string;
}

export type ScopeVerification = {
    receiptHash: string;
    at: string;
    status: ConsentStatus;
    valid: boolean;
    missingScopes: string[];
}

export type ChainFailure = {
    seq: number;
    reason: string;
}

export type ChainVerification = {
    ok: boolean;
    length: number;
    anchor: string | null;
    failures: ChainFailure[];
}

export type LedgerSummary = {
    receiptsIssued: number;
    revocations: number;
    anchoredEntries: number;
    subjects: number;
    anchor: string | null;
}
