/**
 * @ledger-module: Pseudonymization
 * @ledger-risk: moderate
 * @ledger-ethics: high
 * @ledger-scope: utility
 *
 * @description: Utilities for namespacing and hashing subject and grantor identifiers with HMAC-SHA256.
 * The ledger itself must keep raw identifiers so grantors can look their
 * receipts up, but operator logs only ever see short keyed digests.
 *
 * @impact
 * Risk: Hashing mistakes make log lines impossible to correlate.
 * Ethics: Prevents accidental logging of raw subject identifiers.
 */

import crypto from 'node:crypto';

const HEX_DIGEST_LENGTH = 64;
const DEFAULT_SHORT_LENGTH = 12;
const HEX_64_REGEX = /^[a-f0-9]{64}$/i;

export type IdentifierNamespace = 'subject' | 'grantor' | 'client';

/**
 * Hash an identifier with HMAC-SHA256, namespacing by ID type so subject
 * "alice" and grantor "alice" hash differently.
 */
export function hmacId(secret: string, id: string, namespace: IdentifierNamespace): string {
    if (!secret || secret.trim().length === 0) {
        throw new Error('Pseudonymization secret must be provided.');
    }
    const input = `${namespace}:${String(id)}`;
    return crypto.createHmac('sha256', secret).update(input).digest('hex');
}

/**
 * Present a shortened hash for operator-facing logs while keeping the
 * full digest elsewhere.
 */
export function shortHash(
    hash: string,
    length: number = DEFAULT_SHORT_LENGTH
): string {
    if (!hash) return '';
    return hash.slice(0, Math.max(1, Math.min(length, HEX_DIGEST_LENGTH)));
}

/**
 * Log label for an identifier. Values that already look like a 64-hex
 * digest (receipt hashes, for instance) are only shortened.
 */
export function pseudonymLabel(
    id: string | null | undefined,
    secret: string,
    namespace: IdentifierNamespace
): string {
    if (!id) {
        return 'none';
    }
    const trimmed = id.trim();
    if (HEX_64_REGEX.test(trimmed)) {
        return shortHash(trimmed);
    }
    return shortHash(hmacId(secret, trimmed, namespace));
}
