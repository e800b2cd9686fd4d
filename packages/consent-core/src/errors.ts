/**
 * @description: Error kinds raised by the receipt store, revocation engine and verification API.
 * @ledger-scope: core
 * @ledger-module: ConsentLedgerErrors
 * @ledger-risk: low - Wrong codes mislead callers but never corrupt the ledger.
 * @ledger-ethics: moderate - Callers rely on these codes to tell a refusal from a fault.
 */

export type ConsentLedgerErrorCode =
    | 'DUPLICATE_RECEIPT'
    | 'UNKNOWN_RECEIPT'
    | 'INVALID_SIGNATURE'
    | 'NOT_FOUND'
    | 'INVALID_RECEIPT'
    | 'INVALID_TIMESTAMP'
    | 'CHAIN_MISMATCH'
    | 'ALREADY_REVOKED';

export class ConsentLedgerError extends Error {
    readonly code: ConsentLedgerErrorCode;

    constructor(code: ConsentLedgerErrorCode, message: string) {
        super(message);
        this.name = 'ConsentLedgerError';
        this.code = code;
    }
}

export function isConsentLedgerError(error: unknown, code?: ConsentLedgerErrorCode): error is ConsentLedgerError {
    if (!(error instanceof ConsentLedgerError)) {
        return false;
    }
    return code === undefined || error.code === code;
}
