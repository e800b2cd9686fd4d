/**
 * @description: Lists a subject's receipt chain with the status of each receipt.
 * @ledger-scope: backend
 * @ledger-module: SubjectHandlers
 * @ledger-risk: low - Read-only view over the ledger indexes.
 * @ledger-ethics: high - Returns everything a subject has consented to.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import { isConsentLedgerError } from '@reciprocal/consent-core';
import type { ConsentLedger } from '@reciprocal/shared';
import { ledgerErrorStatus, sendError, sendJson } from '../http/json.js';
import type { LogRequest } from '../utils/requestLogger.js';

type SubjectHandlerDeps = {
  ledger: ConsentLedger;
  logRequest: LogRequest;
};

const createSubjectHandlers = ({ ledger, logRequest }: SubjectHandlerDeps) => {
  const handleSubjectReceiptsRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
    subjectId: string,
    parsedUrl: URL
  ): Promise<void> => {
    if (req.method !== 'GET') {
      sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
      logRequest(req, res, 'subject receipts method-not-allowed');
      return;
    }

    try {
      const receipts = ledger.history(subjectId, parsedUrl.searchParams.get('at') ?? new Date());
      sendJson(res, 200, {
        subjectId,
        latest: ledger.latest(subjectId),
        receipts
      });
      logRequest(req, res, `subject receipts count=${receipts.length}`);
    } catch (error) {
      if (!isConsentLedgerError(error)) {
        throw error;
      }
      sendError(res, ledgerErrorStatus[error.code], error.code, error.message);
      logRequest(req, res, `subject receipts ${error.code}`);
    }
  };

  return { handleSubjectReceiptsRequest };
};

export { createSubjectHandlers };
export type { SubjectHandlerDeps };
