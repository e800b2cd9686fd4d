/**
 * @ledger-module: ReceiptValidation
 * @ledger-risk: moderate
 * @ledger-ethics: critical
 * @ledger-scope: utility
 *
 * @description
 * Shape checks for receipts arriving from callers, the wire, or storage.
 * Split out so the ledger, the SQLite log and the HTTP handlers share one
 * definition of a well-formed receipt.
 *
 * @impact
 * Risk: Validation mistakes can corrupt or reject consent records.
 * Ethics: Malformed records must never enter the audit trail.
 */

import { ConsentLedgerError } from './errors.js';
import { normalizeScope } from './evaluators.js';
import type { ConsentReceipt, RevocationRecord } from './types.js';

const HEX_64_REGEX = /^[a-f0-9]{64}$/;

// Only signed fields may be stored; anything else would sit outside every hash.
const RECEIPT_FIELDS = new Set([
  'subjectId',
  'grantorId',
  'grantorKey',
  'scope',
  'issuedAt',
  'expiresAt',
  'prevHash',
  'signature'
]);
const REVOCATION_FIELDS = new Set(['receiptHash', 'revokedAt', 'signature']);

const invalid = (source: string, detail: string): ConsentLedgerError =>
  new ConsentLedgerError('INVALID_RECEIPT', `Receipt from "${source}" is invalid (${detail}).`);

const invalidRevocation = (source: string, detail: string): ConsentLedgerError =>
  new ConsentLedgerError('INVALID_RECEIPT', `Revocation from "${source}" is invalid (${detail}).`);

export function isReceiptHash(value: unknown): value is string {
  return typeof value === 'string' && HEX_64_REGEX.test(value);
}

/**
 * True only for the exact form Date#toISOString produces (UTC, millisecond
 * precision). Offset-less or prose dates would parse in the host time zone.
 */
export function isCanonicalTimestamp(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  const parsed = Date.parse(value);
  return !Number.isNaN(parsed) && new Date(parsed).toISOString() === value;
}

export function assertValidConsentReceipt(value: unknown, source: string): asserts value is ConsentReceipt {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw invalid(source, 'expected object');
  }

  const record = value as Record<string, unknown>;
  const unexpectedField = Object.keys(record).find((key) => !RECEIPT_FIELDS.has(key));
  if (unexpectedField !== undefined) {
    throw invalid(source, `unexpected field ${unexpectedField}`);
  }

  const requiredStringFields = ['subjectId', 'grantorId', 'grantorKey', 'issuedAt', 'signature'] as const;

  for (const field of requiredStringFields) {
    const fieldValue = record[field];
    if (typeof fieldValue !== 'string' || fieldValue.trim().length === 0) {
      throw invalid(source, `missing field ${field}`);
    }
  }

  if (!isCanonicalTimestamp(record.issuedAt)) {
    throw invalid(source, 'issuedAt must be an ISO 8601 UTC timestamp');
  }
  const issuedAt = Date.parse(record.issuedAt);

  if (record.expiresAt !== null) {
    if (!isCanonicalTimestamp(record.expiresAt)) {
      throw invalid(source, 'expiresAt must be an ISO 8601 UTC timestamp or null');
    }
    if (Date.parse(record.expiresAt) <= issuedAt) {
      throw invalid(source, 'expiresAt must be after issuedAt');
    }
  }

  if (record.prevHash !== null && !isReceiptHash(record.prevHash)) {
    throw invalid(source, 'prevHash must be a receipt hash or null');
  }

  if (!Array.isArray(record.scope) || record.scope.length === 0) {
    throw invalid(source, 'scope must be a non-empty array');
  }

  const scope: unknown[] = record.scope;
  if (!scope.every((entry): entry is string => typeof entry === 'string')) {
    throw invalid(source, 'scope entries must be strings');
  }

  // The signature covers the exact scope array, so only the canonical form is accepted.
  const normalized = normalizeScope(scope);
  if (normalized.length !== scope.length || normalized.some((entry, index) => entry !== scope[index])) {
    throw invalid(source, 'scope must be trimmed, sorted and de-duplicated');
  }
}

export function assertValidRevocationRecord(value: unknown, source: string): asserts value is RevocationRecord {
  if (!value || typeof value !== 'object' || Array.isArray(value)) {
    throw invalidRevocation(source, 'expected object');
  }

  const record = value as Record<string, unknown>;
  const unexpectedField = Object.keys(record).find((key) => !REVOCATION_FIELDS.has(key));
  if (unexpectedField !== undefined) {
    throw invalidRevocation(source, `unexpected field ${unexpectedField}`);
  }
  if (!isReceiptHash(record.receiptHash)) {
    throw invalidRevocation(source, 'receiptHash must be a receipt hash');
  }
  if (!isCanonicalTimestamp(record.revokedAt)) {
    throw invalidRevocation(source, 'revokedAt must be an ISO 8601 UTC timestamp');
  }
  if (typeof record.signature !== 'string' || record.signature.length === 0) {
    throw invalidRevocation(source, 'missing field signature');
  }
}
