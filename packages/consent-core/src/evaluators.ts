/**
 * @ledger-module: ConsentEvaluators
 * @ledger-risk: moderate
 * @ledger-ethics: high
 * @ledger-scope: core
 *
 * @description: Pure derivation of consent status and scope coverage.
 *
 * @impact
 * Risk: A wrong precedence between expiry and revocation would report withdrawn consent as usable.
 * Ethics: Decides whether a use of someone's data is covered by what they agreed to.
 */

import { hashReceipt } from './canonical.js';
import { ConsentLedgerError } from './errors.js';
import type { ConsentReceipt, ConsentStatus, RevocationRecord } from './types.js';

export type InstantInput = Date | string | number;

/**
 * Parses an instant into a Date, rejecting anything that does not name a
 * real point in time.
 */
export function parseInstant(value: InstantInput, label = 'timestamp'): Date {
    const date = value instanceof Date ? new Date(value.getTime()) : new Date(value);
    if (Number.isNaN(date.getTime())) {
        throw new ConsentLedgerError('INVALID_TIMESTAMP', `Invalid ${label}: ${String(value)}`);
    }
    return date;
}

/**
 * Revocation takes precedence over expiry; expiry is exclusive of the
 * expiresAt instant itself.
 */
export function computeConsentStatus(
    receipt: ConsentReceipt,
    revocations: readonly RevocationRecord[],
    at: Date
): ConsentStatus {
    const instant = at.getTime();
    const receiptHash = hashReceipt(receipt);

    const revokedInForce = revocations.some((revocation) =>
        revocation.receiptHash === receiptHash && Date.parse(revocation.revokedAt) <= instant
    );
    if (revokedInForce) {
        return 'revoked';
    }

    if (receipt.expiresAt !== null && instant > Date.parse(receipt.expiresAt)) {
        return 'expired';
    }

    return 'active';
}

export function normalizeScope(scope: readonly string[]): string[] {
    const cleaned = scope
        .map((entry) => String(entry).trim())
        .filter((entry) => entry.length > 0);
    return [...new Set(cleaned)].sort();
}

export function findMissingScopes(granted: readonly string[], required: readonly string[]): string[] {
    const grantedSet = new Set(granted);
    return normalizeScope(required).filter((entry) => !grantedSet.has(entry));
}
