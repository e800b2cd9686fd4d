/**
 * @description: Public exports for the consent ledger, its storage backends and shared utilities.
 * @ledger-scope: interface
 * @ledger-module: SharedIndex
 * @ledger-risk: low - Export changes can break downstream imports.
 * @ledger-ethics: low - This module re-exports without processing data.
 */

/**
 * Logging utilities.
 */
export { logger, createModuleLogger, sanitizeLogData } from './logger.js';

/**
 * Consent ledger: receipt store, revocation engine and verification API.
 */
export { ConsentLedger } from './consentLedger.js';
export type { ConsentLedgerOptions, SubjectReceipt } from './consentLedger.js';
export {
  createConsentLedgerFromEnv,
  createLedgerLogFromEnv,
  getDefaultConsentLedger,
  resolveLedgerBackend
} from './consentLedgerStore.js';
export type { LedgerBackend } from './consentLedgerStore.js';

/**
 * Ledger log backends.
 */
export type { LedgerLog } from './ledgerLog.js';
export { MemoryLedgerLog } from './memoryLedgerLog.js';
export { SqliteLedgerLog } from './sqliteLedgerLog.js';

export { SerialQueue } from './serialQueue.js';

/**
 * Pseudonymization helpers for identifiers that appear in logs.
 */
export { hmacId, pseudonymLabel, shortHash } from './pseudonymization.js';
export type { IdentifierNamespace } from './pseudonymization.js';
