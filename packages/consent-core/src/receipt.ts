/**
 * @description: Builds and signs consent receipts in their canonical form.
 * @ledger-scope: core
 * @ledger-module: ReceiptFactory
 * @ledger-risk: moderate - A receipt built off-canonical would be rejected by the ledger.
 * @ledger-ethics: high - Records the scope a subject actually granted.
 */
import type { KeyObject } from 'node:crypto';
import { normalizeScope, parseInstant, type InstantInput } from './evaluators.js';
import { encodePublicKey, signReceiptBody } from './signatures.js';
import type { ConsentReceipt, ReceiptBody } from './types.js';

export type GrantorSigner = {
  publicKey: KeyObject;
  privateKey: KeyObject;
};

export type CreateReceiptInput = {
  subjectId: string;
  grantorId: string;
  scope: readonly string[];
  issuedAt?: InstantInput;
  expiresAt?: InstantInput | null;
  prevHash?: string | null;
};

export function createReceipt(input: CreateReceiptInput, signer: GrantorSigner): ConsentReceipt {
  const body: ReceiptBody = {
    subjectId: input.subjectId.trim(),
    grantorId: input.grantorId.trim(),
    grantorKey: encodePublicKey(signer.publicKey),
    scope: normalizeScope(input.scope),
    issuedAt: parseInstant(input.issuedAt ?? new Date(), 'issuedAt').toISOString(),
    expiresAt: input.expiresAt === undefined || input.expiresAt === null
      ? null
      : parseInstant(input.expiresAt, 'expiresAt').toISOString(),
    prevHash: input.prevHash ?? null
  };

  return {
    ...body,
    signature: signReceiptBody(body, signer.privateKey)
  };
}
