/**
 * @ledger-module: CanonicalHashing
 * @ledger-risk: high
 * @ledger-ethics: high
 * @ledger-scope: core
 *
 * @description
 * Deterministic JSON encoding and SHA-256 hashing for receipts, revocations
 * and ledger entries. Object keys are sorted and undefined members are
 * dropped, so the same content always hashes to the same digest no matter
 * how the caller built the object.
 *
 * @impact
 * Risk: Any change to the encoding invalidates every stored hash.
 * Ethics: Tamper evidence for consent records rests on these digests.
 */

import crypto from 'node:crypto';
import type { ConsentReceipt, ReceiptBody, RevocationRecord } from './types.js';

export function canonicalJson(value: unknown): string {
    if (value === null || typeof value === 'boolean' || typeof value === 'string') {
        return JSON.stringify(value);
    }

    if (typeof value === 'number') {
        if (!Number.isFinite(value)) {
            throw new Error(`Cannot canonicalize non-finite number ${value}.`);
        }
        return JSON.stringify(value);
    }

    if (Array.isArray(value)) {
        return `[${value.map((entry) => canonicalJson(entry === undefined ? null : entry)).join(',')}]`;
    }

    if (typeof value === 'object') {
        const record = value as Record<string, unknown>;
        const members = Object.keys(record)
            .filter((key) => record[key] !== undefined)
            .sort()
            .map((key) => `${JSON.stringify(key)}:${canonicalJson(record[key])}`);
        return `{${members.join(',')}}`;
    }

    throw new Error(`Cannot canonicalize value of type ${typeof value}.`);
}

export function sha256Hex(input: string): string {
    return crypto.createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Strip the signature (and anything else a caller tacked on) so only the
 * signed body contributes to the hash.
 */
export function receiptBody(receipt: ReceiptBody | ConsentReceipt): ReceiptBody {
    return {
        subjectId: receipt.subjectId,
        grantorId: receipt.grantorId,
        grantorKey: receipt.grantorKey,
        scope: [...receipt.scope],
        issuedAt: receipt.issuedAt,
        expiresAt: receipt.expiresAt,
        prevHash: receipt.prevHash
    };
}

export function hashReceipt(receipt: ReceiptBody | ConsentReceipt): string {
    return sha256Hex(canonicalJson(receiptBody(receipt)));
}

export function hashRevocation(revocation: RevocationRecord): string {
    return sha256Hex(canonicalJson({
        receiptHash: revocation.receiptHash,
        revokedAt: revocation.revokedAt,
        signature: revocation.signature
    }));
}

export type EntryHashInput = {
    seq: number;
    // The kind as stored, so unreadable entries can still be checked.
    kind: string;
    recordHash: string;
    prevEntryHash: string | null;
    appendedAt: string;
};

export function hashEntry(input: EntryHashInput): string {
    return sha256Hex(canonicalJson({
        seq: input.seq,
        kind: input.kind,
        recordHash: input.recordHash,
        prevEntryHash: input.prevEntryHash,
        appendedAt: input.appendedAt
    }));
}
