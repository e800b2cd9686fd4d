/**
 * @ledger-module: Logger
 * @ledger-risk: low
 * @ledger-ethics: moderate
 * @ledger-scope: utility
 *
 * @description: Winston-based logging utility with console and file transports. Provides structured logging for ledger and API operations.
 *
 * @impact
 * Risk: Logging failures can make debugging difficult but won't break core functionality.
 * Ethics: Logs may contain identifiers or key material, affecting privacy and auditability.
 */

import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;
const splatSymbol = Symbol.for('splat');

// --- Redaction rules ---
// Grantors sign locally, so a private key should never reach the ledger process.
// If one is pasted into a request anyway, keep it out of the log files.
const PRIVATE_KEY_BLOCK_REGEX = /-----BEGIN [A-Z ]*PRIVATE KEY-----[\s\S]*?-----END [A-Z ]*PRIVATE KEY-----/g;

/**
 * Recursively sanitize log data to strip PEM private key blocks. Identifiers
 * are pseudonymized by callers before logging; this only scrubs key material.
 */
export function sanitizeLogData<T>(value: T): T {
  if (typeof value === 'string') {
    return value.replace(PRIVATE_KEY_BLOCK_REGEX, '[REDACTED_PRIVATE_KEY]') as T;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry)) as T;
  }

  if (value && typeof value === 'object' && !(value instanceof Error)) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = sanitizeLogData(val);
    }
    return sanitized as T;
  }

  return value;
}

// --- Winston formatters ---
const sanitizeFormat = format((info) => {
  info.message = sanitizeLogData(info.message);

  // Clean any extra args passed to logger.info/debug/etc.
  const splat = info[splatSymbol] as unknown[] | undefined;
  if (Array.isArray(splat)) {
    info[splatSymbol] = splat.map((item) => sanitizeLogData(item));
  }

  return info;
});

const logFormat = printf(({ level, message, timestamp, module }) => {
  const scope = typeof module === 'string' ? ` (${module})` : '';
  return `${timestamp} [${level}]${scope}: ${message}`;
});

// --- Logger output configuration ---
const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

/**
 * Winston logger instance with console and file transports
 */
export const logger = createLogger({
  level: (process.env.LOG_LEVEL || 'debug').toLowerCase(),
  format: combine(
    sanitizeFormat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console(),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});

export const createModuleLogger = (module: string) => logger.child({ module });
