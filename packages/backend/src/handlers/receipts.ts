/**
 * @description: Handles receipt append, lookup, status, scope verification and revocation endpoints.
 * @ledger-scope: backend
 * @ledger-module: ReceiptHandlers
 * @ledger-risk: high - Handler bugs can admit unsigned writes or misreport consent status.
 * @ledger-ethics: high - These endpoints decide whether data use is covered by consent.
 */
import crypto from 'node:crypto';
import type { IncomingMessage, ServerResponse } from 'node:http';
import { isConsentLedgerError, parseInstant } from '@reciprocal/consent-core';
import { createModuleLogger, type ConsentLedger } from '@reciprocal/shared';
import { ledgerErrorStatus, readJsonBody, sendError, sendJson } from '../http/json.js';
import type { SimpleRateLimiter } from '../services/rateLimiter.js';
import { getClientIp } from '../utils/clientIp.js';
import type { LogRequest } from '../utils/requestLogger.js';

const receiptLogger = createModuleLogger('receiptHandlers');

type ReceiptHandlerDeps = {
  ledger: ConsentLedger;
  logRequest: LogRequest;
  writeLimiter: SimpleRateLimiter;
  writeToken: string | null;
  maxBodyBytes: number;
  trustProxy: boolean;
};

const WRITE_TOKEN_HEADER = 'x-consent-ledger-token';

const tokensMatch = (provided: string, expected: string): boolean => {
  const providedBytes = Buffer.from(provided);
  const expectedBytes = Buffer.from(expected);
  return providedBytes.length === expectedBytes.length && crypto.timingSafeEqual(providedBytes, expectedBytes);
};

const parseScopes = (parsedUrl: URL): string[] =>
  parsedUrl.searchParams
    .getAll('scope')
    .flatMap(value => value.split(','))
    .map(value => value.trim())
    .filter(value => value.length > 0);

// --- Handler factory ---
const createReceiptHandlers = ({
  ledger,
  logRequest,
  writeLimiter,
  writeToken,
  maxBodyBytes,
  trustProxy
}: ReceiptHandlerDeps) => {
  // Maps ledger refusals to 4xx and anything else to a logged 500.
  const respondWithError = (req: IncomingMessage, res: ServerResponse, error: unknown, context: string): void => {
    if (isConsentLedgerError(error)) {
      sendError(res, ledgerErrorStatus[error.code], error.code, error.message);
      logRequest(req, res, `${context} ${error.code}`);
      return;
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    receiptLogger.error(`${context} failed: ${errorMessage}`);
    sendError(res, 500, 'INTERNAL_ERROR', 'Internal server error');
    logRequest(req, res, `${context} error ${errorMessage}`);
  };

  /**
   * Token and rate-limit checks shared by every write. Returns false once a
   * response has already been sent.
   */
  const admitWrite = (req: IncomingMessage, res: ServerResponse, context: string): boolean => {
    if (writeToken) {
      const providedToken = req.headers[WRITE_TOKEN_HEADER];
      const providedValue = Array.isArray(providedToken) ? providedToken[0] : providedToken;
      if (!providedValue) {
        sendError(res, 401, 'UNAUTHORIZED', 'Missing write token');
        logRequest(req, res, `${context} missing-token`);
        return false;
      }
      if (!tokensMatch(providedValue, writeToken)) {
        sendError(res, 403, 'FORBIDDEN', 'Invalid write token');
        logRequest(req, res, `${context} invalid-token`);
        return false;
      }
    }

    // Rate-limit writes per client to protect the log from abuse.
    const rateLimitResult = writeLimiter.check(getClientIp(req, trustProxy));
    if (!rateLimitResult.allowed) {
      res.setHeader('Retry-After', rateLimitResult.retryAfter.toString());
      sendJson(res, 429, {
        error: { code: 'RATE_LIMITED', message: 'Too many ledger writes' },
        retryAfter: rateLimitResult.retryAfter
      });
      logRequest(req, res, `${context} rate-limited`);
      return false;
    }

    return true;
  };

  const handleAppendRequest = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    try {
      if (req.method !== 'POST') {
        sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
        logRequest(req, res, 'receipt append method-not-allowed');
        return;
      }

      if (!admitWrite(req, res, 'receipt append')) {
        return;
      }

      const body = await readJsonBody(req, maxBodyBytes);
      if (!body.ok) {
        sendError(res, body.statusCode, 'BAD_REQUEST', body.error);
        logRequest(req, res, `receipt append ${body.error}`);
        return;
      }

      const receiptHash = await ledger.append(body.value);
      sendJson(res, 201, { ok: true, receiptHash, anchor: ledger.anchor() });
      logRequest(req, res, 'receipt append success');
    } catch (error) {
      respondWithError(req, res, error, 'receipt append');
    }
  };

  const handleReceiptRequest = async (req: IncomingMessage, res: ServerResponse, receiptHash: string): Promise<void> => {
    try {
      if (req.method !== 'GET') {
        sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
        logRequest(req, res, 'receipt get method-not-allowed');
        return;
      }

      const receipt = ledger.get(receiptHash);
      sendJson(res, 200, { receiptHash, receipt, revocation: ledger.revocationFor(receiptHash) });
      logRequest(req, res, 'receipt get success');
    } catch (error) {
      respondWithError(req, res, error, 'receipt get');
    }
  };

  const handleStatusRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
    receiptHash: string,
    parsedUrl: URL
  ): Promise<void> => {
    try {
      if (req.method !== 'GET') {
        sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
        logRequest(req, res, 'receipt status method-not-allowed');
        return;
      }

      const at = parseInstant(parsedUrl.searchParams.get('at') ?? new Date(), 'at');
      const status = ledger.status(receiptHash, at);
      sendJson(res, 200, { receiptHash, status, at: at.toISOString() });
      logRequest(req, res, `receipt status ${status}`);
    } catch (error) {
      respondWithError(req, res, error, 'receipt status');
    }
  };

  const handleVerifyRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
    receiptHash: string,
    parsedUrl: URL
  ): Promise<void> => {
    try {
      if (req.method !== 'GET') {
        sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
        logRequest(req, res, 'receipt verify method-not-allowed');
        return;
      }

      const verification = ledger.verify(
        receiptHash,
        parseScopes(parsedUrl),
        parsedUrl.searchParams.get('at') ?? new Date()
      );
      sendJson(res, 200, verification);
      logRequest(req, res, `receipt verify valid=${verification.valid}`);
    } catch (error) {
      respondWithError(req, res, error, 'receipt verify');
    }
  };

  const handleRevocationRequest = async (
    req: IncomingMessage,
    res: ServerResponse,
    receiptHash: string
  ): Promise<void> => {
    try {
      if (req.method !== 'POST') {
        sendError(res, 405, 'METHOD_NOT_ALLOWED', 'Method not allowed');
        logRequest(req, res, 'receipt revoke method-not-allowed');
        return;
      }

      if (!admitWrite(req, res, 'receipt revoke')) {
        return;
      }

      const body = await readJsonBody(req, maxBodyBytes);
      if (!body.ok) {
        sendError(res, body.statusCode, 'BAD_REQUEST', body.error);
        logRequest(req, res, `receipt revoke ${body.error}`);
        return;
      }

      const payload = body.value;
      const signature = typeof payload === 'object' && payload !== null && 'signature' in payload
        ? payload.signature
        : undefined;
      if (typeof signature !== 'string' || signature.length === 0) {
        sendError(res, 400, 'BAD_REQUEST', 'Missing signature');
        logRequest(req, res, 'receipt revoke missing-signature');
        return;
      }

      const revocation = await ledger.revoke(receiptHash, signature);
      sendJson(res, 201, { ok: true, revocation, anchor: ledger.anchor() });
      logRequest(req, res, 'receipt revoke success');
    } catch (error) {
      respondWithError(req, res, error, 'receipt revoke');
    }
  };

  return {
    handleAppendRequest,
    handleReceiptRequest,
    handleStatusRequest,
    handleVerifyRequest,
    handleRevocationRequest
  };
};

export { createReceiptHandlers };
export type { ReceiptHandlerDeps };
