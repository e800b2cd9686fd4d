/**
 * @description: Factory for creating the consent ledger with env-driven configuration.
 * @ledger-scope: utility
 * @ledger-module: ConsentLedgerFactory
 * @ledger-risk: high - Misconfiguration can point the ledger at an empty or unwritable log.
 * @ledger-ethics: high - Refuses to start without a pseudonymization secret for log labels.
 */
import { ConsentLedger } from './consentLedger.js';
import type { LedgerLog } from './ledgerLog.js';
import { createModuleLogger } from './logger.js';
import { MemoryLedgerLog } from './memoryLedgerLog.js';
import { SqliteLedgerLog } from './sqliteLedgerLog.js';

const ledgerStoreLogger = createModuleLogger('consentLedgerStore');

export type LedgerBackend = 'sqlite' | 'memory';

const DEFAULT_SQLITE_PATH = './data/consent-ledger.db';

export function resolveLedgerBackend(value: string | undefined): LedgerBackend {
  const backend = value?.trim().toLowerCase();
  if (!backend || backend === 'sqlite') {
    return 'sqlite';
  }
  if (backend === 'memory') {
    return 'memory';
  }
  throw new Error(`Unsupported CONSENT_LEDGER_BACKEND "${backend}". Expected "sqlite" or "memory".`);
}

export function createLedgerLogFromEnv(env: NodeJS.ProcessEnv = process.env): LedgerLog {
  const backend = resolveLedgerBackend(env.CONSENT_LEDGER_BACKEND);
  if (backend === 'memory') {
    ledgerStoreLogger.warn('Using in-memory ledger log; receipts will not survive a restart.');
    return new MemoryLedgerLog();
  }

  const envPath = env.CONSENT_LEDGER_SQLITE_PATH?.trim();
  const dbPath = envPath || DEFAULT_SQLITE_PATH;

  try {
    return new SqliteLedgerLog({ dbPath });
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    const isPermission = code === 'EACCES' || code === 'EPERM';
    if (isPermission && envPath) {
      ledgerStoreLogger.error(`Ledger path "${envPath}" is not writable: ${String(error)}`);
    }
    throw error;
  }
}

export async function createConsentLedgerFromEnv(env: NodeJS.ProcessEnv = process.env): Promise<ConsentLedger> {
  const pseudonymizationSecret = env.CONSENT_LOG_PSEUDONYMIZATION_SECRET?.trim();
  if (!pseudonymizationSecret) {
    throw new Error('Missing required environment variable: CONSENT_LOG_PSEUDONYMIZATION_SECRET');
  }

  const log = createLedgerLogFromEnv(env);
  try {
    return await ConsentLedger.open({ log, pseudonymizationSecret });
  } catch (error) {
    log.close();
    throw error;
  }
}

let cachedLedger: Promise<ConsentLedger> | null = null;

export function getDefaultConsentLedger(): Promise<ConsentLedger> {
  if (!cachedLedger) {
    cachedLedger = createConsentLedgerFromEnv();
  }
  return cachedLedger;
}
