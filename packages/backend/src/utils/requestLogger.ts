/**
 * @description: Provides structured request logging for backend endpoints.
 * @ledger-scope: utility
 * @ledger-module: RequestLogger
 * @ledger-risk: low - Logging failures reduce observability but do not block requests.
 * @ledger-ethics: moderate - Logs must avoid leaking subject identifiers.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import { logger } from '@reciprocal/shared';

type LogRequest = (req: IncomingMessage, res: ServerResponse, extra?: string) => void;

const SUBJECT_PATH_REGEX = /^\/api\/subjects\/[^/]+/;

/**
 * Builds a short log entry per request. Query strings are dropped and
 * subject path segments masked, since both can carry raw identifiers.
 */
const logRequest: LogRequest = (req, res, extra = '') => {
  const timestamp = new Date().toISOString();

  let logUrl = req.url ?? '';
  try {
    logUrl = new URL(logUrl, 'http://localhost').pathname.replace(SUBJECT_PATH_REGEX, '/api/subjects/:subject');
  } catch {
    logUrl = '(unparseable url)';
  }

  logger.info(`[${timestamp}] ${req.method} ${logUrl} -> ${res.statusCode} ${extra}`.trim());
};

export { logRequest };
export type { LogRequest };
