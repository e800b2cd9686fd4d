/**
 * @description: Builds the consent ledger HTTP server and routes API paths to their handlers.
 * @ledger-scope: core
 * @ledger-module: ConsentServer
 * @ledger-risk: high - Routing mistakes can expose write endpoints or misroute verification.
 * @ledger-ethics: high - This surface is where third parties check whether consent holds.
 */
import http from 'node:http';
import type { ConsentLedger } from '@reciprocal/shared';
import type { RuntimeConfig } from './config.js';
import { createLedgerHandlers } from './handlers/ledger.js';
import { createReceiptHandlers } from './handlers/receipts.js';
import { createSubjectHandlers } from './handlers/subjects.js';
import { setCorsHeaders } from './http/cors.js';
import { sendError, sendJson } from './http/json.js';
import type { SimpleRateLimiter } from './services/rateLimiter.js';
import type { LogRequest } from './utils/requestLogger.js';

type ConsentServerDeps = {
  ledger: ConsentLedger;
  config: RuntimeConfig;
  writeLimiter: SimpleRateLimiter;
  logRequest: LogRequest;
};

const RECEIPT_ROUTE_REGEX = /^\/api\/receipts\/([^/]+)(?:\/(status|verify|revocations))?\/?$/;
const SUBJECT_ROUTE_REGEX = /^\/api\/subjects\/([^/]+)\/receipts\/?$/;

const createConsentServer = ({ ledger, config, writeLimiter, logRequest }: ConsentServerDeps): http.Server => {
  // --- Handler wiring ---
  const receiptHandlers = createReceiptHandlers({
    ledger,
    logRequest,
    writeLimiter,
    writeToken: config.api.writeToken,
    maxBodyBytes: config.api.maxBodyBytes,
    trustProxy: config.server.trustProxy
  });
  const ledgerHandlers = createLedgerHandlers({ ledger, logRequest });
  const { handleSubjectReceiptsRequest } = createSubjectHandlers({ ledger, logRequest });

  return http.createServer(async (req, res) => {
    // --- Early request guard ---
    if (!req.url) {
      res.statusCode = 400;
      res.end('Bad Request');
      return;
    }

    try {
      setCorsHeaders(req, res, config.cors.allowedOrigins);

      // Preflight requests never reach the handlers.
      if (req.method === 'OPTIONS') {
        res.statusCode = 204;
        res.end();
        logRequest(req, res, 'preflight');
        return;
      }

      const parsedUrl = new URL(req.url, 'http://localhost');
      const { pathname } = parsedUrl;

      // --- API routes ---
      if (pathname === '/api/health') {
        sendJson(res, 200, { ok: true, anchor: ledger.anchor() });
        logRequest(req, res, 'health');
        return;
      }

      if (pathname === '/api/receipts' || pathname === '/api/receipts/') {
        await receiptHandlers.handleAppendRequest(req, res);
        return;
      }

      const receiptMatch = RECEIPT_ROUTE_REGEX.exec(pathname);
      if (receiptMatch) {
        const receiptHash = decodeURIComponent(receiptMatch[1]).toLowerCase();
        switch (receiptMatch[2]) {
          case 'status':
            await receiptHandlers.handleStatusRequest(req, res, receiptHash, parsedUrl);
            return;
          case 'verify':
            await receiptHandlers.handleVerifyRequest(req, res, receiptHash, parsedUrl);
            return;
          case 'revocations':
            await receiptHandlers.handleRevocationRequest(req, res, receiptHash);
            return;
          default:
            await receiptHandlers.handleReceiptRequest(req, res, receiptHash);
            return;
        }
      }

      const subjectMatch = SUBJECT_ROUTE_REGEX.exec(pathname);
      if (subjectMatch) {
        await handleSubjectReceiptsRequest(req, res, decodeURIComponent(subjectMatch[1]), parsedUrl);
        return;
      }

      if (pathname === '/api/ledger' || pathname === '/api/ledger/') {
        await ledgerHandlers.handleSummaryRequest(req, res);
        return;
      }

      if (pathname === '/api/ledger/entries') {
        await ledgerHandlers.handleEntriesRequest(req, res, parsedUrl);
        return;
      }

      if (pathname === '/api/ledger/verify') {
        await ledgerHandlers.handleVerifyChainRequest(req, res);
        return;
      }

      sendError(res, 404, 'NOT_FOUND', 'Route not found');
      logRequest(req, res, 'unknown route');
    } catch (error) {
      if (error instanceof URIError) {
        sendError(res, 400, 'BAD_REQUEST', 'Malformed path encoding');
        logRequest(req, res, 'malformed path');
        return;
      }
      if (!res.headersSent) {
        sendError(res, 500, 'INTERNAL_ERROR', 'Internal server error');
      } else {
        res.end();
      }
      logRequest(req, res, error instanceof Error ? error.message : 'unknown error');
    }
  });
};

export { createConsentServer };
export type { ConsentServerDeps };
