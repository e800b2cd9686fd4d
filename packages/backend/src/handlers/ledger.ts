/**
 * @description: Serves ledger-wide summary, entry listing and chain verification endpoints.
 * @ledger-scope: backend
 * @ledger-module: LedgerHandlers
 * @ledger-risk: moderate - Misreported chain status hides tampering from auditors.
 * @ledger-ethics: moderate - Entry listings expose subject identifiers to readers of the API.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import { createModuleLogger, type ConsentLedger } from '@reciprocal/shared';
import { sendError, sendJson } from '../http/json.js';
import type { LogRequest } from '../utils/requestLogger.js';

const ledgerHandlerLogger = createModuleLogger('ledgerHandlers');

type LedgerHandlerDeps = {
  ledger: ConsentLedger;
  logRequest: LogRequest;
};

const DEFAULT_ENTRY_PAGE = 100;
const MAX_ENTRY_PAGE = 500;

const parseNonNegativeInt = (value: string | null, fallback: number): number | null => {
  if (value === null || value === '') {
    return fallback;
  }
  return /^\d+$/.test(value) ? parseInt(value, 10) : null;
};

const createLedgerHandlers = ({ ledger, logRequest }: LedgerHandlerDeps) => {
  const rejectNonGet = (req: IncomingMessage, res: ServerResponse, context: string): boolean => {
    if (req.method === 'GET') {
      return false;
    }
    sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
    logRequest(req, res, `${context} method-not-allowed`);
    return true;
  };

  const handleSummaryRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (rejectNonGet(req, res, 'ledger summary')) {
      return;
    }
    sendJson(res, 200, ledger.summary());
    logRequest(req, res, 'ledger summary');
  };

  const handleEntriesRequest = async (req: IncomingMessage, res: ServerResponse, parsedUrl: URL): Promise<void> => {
    if (rejectNonGet(req, res, 'ledger entries')) {
      return;
    }

    const from = parseNonNegativeInt(parsedUrl.searchParams.get('from'), 0);
    const requestedLimit = parseNonNegativeInt(parsedUrl.searchParams.get('limit'), DEFAULT_ENTRY_PAGE);
    if (from === null || requestedLimit === null || requestedLimit === 0) {
      sendError(res, 400, 'BAD_REQUEST', 'from and limit must be non-negative integers (limit > 0)');
      logRequest(req, res, 'ledger entries invalid-range');
      return;
    }

    const limit = Math.min(requestedLimit, MAX_ENTRY_PAGE);
    const allEntries = ledger.entries();
    const page = allEntries.slice(from, from + limit);
    sendJson(res, 200, {
      entries: page,
      total: allEntries.length,
      nextFrom: from + page.length < allEntries.length ? from + page.length : null
    });
    logRequest(req, res, `ledger entries count=${page.length}`);
  };

  const handleVerifyChainRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    if (rejectNonGet(req, res, 'ledger verify')) {
      return;
    }

    const verification = ledger.verifyChain();
    if (!verification.ok) {
      ledgerHandlerLogger.warn(`Chain verification reported ${verification.failures.length} failure(s)`);
    }
    sendJson(res, verification.ok ? 200 : 409, verification);
    logRequest(req, res, `ledger verify ok=${verification.ok}`);
  };

  return { handleSummaryRequest, handleEntriesRequest, handleVerifyChainRequest };
};

export { createLedgerHandlers };
export type { LedgerHandlerDeps };
