/**
 * @ledger-module: GrantorSignatures
 * @ledger-risk: high
 * @ledger-ethics: high
 * @ledger-scope: core
 *
 * @description: Ed25519 signing and verification for receipts and revocations.
 * Public keys travel as base64 SPKI DER so they survive JSON and SQLite
 * unchanged. Revocations sign a domain-separated message so a receipt
 * signature can never be replayed as a revocation.
 *
 * @impact
 * Risk: A verification bug would let anyone forge or withdraw consent.
 * Ethics: Only the grantor who issued consent may revoke it.
 */

import crypto, { type KeyObject } from 'node:crypto';
import { canonicalJson, receiptBody } from './canonical.js';
import type { ConsentReceipt, ReceiptBody } from './types.js';

const ED25519_SIGNATURE_BYTES = 64;

export function encodePublicKey(key: KeyObject): string {
    return key.export({ type: 'spki', format: 'der' }).toString('base64');
}

export function decodePublicKey(encoded: string): KeyObject {
    const key = crypto.createPublicKey({
        key: Buffer.from(encoded, 'base64'),
        format: 'der',
        type: 'spki'
    });
    if (key.asymmetricKeyType !== 'ed25519') {
        throw new Error(`Unsupported grantor key type "${key.asymmetricKeyType ?? 'unknown'}"; expected ed25519.`);
    }
    return key;
}

export function revocationMessage(receiptHash: string): string {
    return canonicalJson({ action: 'revoke', receiptHash });
}

function signMessage(message: string, privateKey: KeyObject): string {
    return crypto.sign(null, Buffer.from(message, 'utf8'), privateKey).toString('base64');
}

function verifyMessage(message: string, signature: string, encodedKey: string): boolean {
    const signatureBytes = Buffer.from(signature, 'base64');
    if (signatureBytes.length !== ED25519_SIGNATURE_BYTES) {
        return false;
    }

    let key: KeyObject;
    try {
        key = decodePublicKey(encodedKey);
    } catch {
        // An undecodable key cannot have produced a valid signature.
        return false;
    }

    return crypto.verify(null, Buffer.from(message, 'utf8'), key, signatureBytes);
}

export function signReceiptBody(body: ReceiptBody, privateKey: KeyObject): string {
    return signMessage(canonicalJson(receiptBody(body)), privateKey);
}

export function verifyReceiptSignature(receipt: ConsentReceipt): boolean {
    return verifyMessage(canonicalJson(receiptBody(receipt)), receipt.signature, receipt.grantorKey);
}

export function signRevocation(receiptHash: string, privateKey: KeyObject): string {
    return signMessage(revocationMessage(receiptHash), privateKey);
}

export function verifyRevocationSignature(receiptHash: string, signature: string, grantorKey: string): boolean {
    return verifyMessage(revocationMessage(receiptHash), signature, grantorKey);
}
