/**
 * @description: Public exports for the consent receipt model.
 * @ledger-scope: interface
 * @ledger-module: ConsentCoreIndex
 * @ledger-risk: low - Export changes can break downstream imports.
 * @ledger-ethics: low - This module re-exports without processing data.
 */
export type {
    ChainFailure,
    ChainVerification,
    ConsentReceipt,
    ConsentStatus,
    LedgerEntry,
    LedgerEntryBase,
    LedgerEntryKind,
    LedgerSummary,
    ReceiptBody,
    RevocationRecord,
    ScopeVerification,
    StoredLedgerEntry,
    UnreadableLedgerEntry
} from './types.js';

export { ConsentLedgerError, isConsentLedgerError } from './errors.js';
export type { ConsentLedgerErrorCode } from './errors.js';

export { canonicalJson, hashEntry, hashReceipt, hashRevocation, receiptBody, sha256Hex } from './canonical.js';
export type { EntryHashInput } from './canonical.js';

export {
    decodePublicKey,
    encodePublicKey,
    revocationMessage,
    signReceiptBody,
    signRevocation,
    verifyReceiptSignature,
    verifyRevocationSignature
} from './signatures.js';

export { computeConsentStatus, findMissingScopes, normalizeScope, parseInstant } from './evaluators.js';
export type { InstantInput } from './evaluators.js';

export {
    assertValidConsentReceipt,
    assertValidRevocationRecord,
    isCanonicalTimestamp,
    isReceiptHash
} from './validation.js';

export { createReceipt } from './receipt.js';
export type { CreateReceiptInput, GrantorSigner } from './receipt.js';
