/**
 * @description: JSON response helpers, bounded body reading and ledger error mapping.
 * @ledger-scope: backend
 * @ledger-module: HttpJson
 * @ledger-risk: moderate - Wrong status codes hide refusals as server faults or vice versa.
 * @ledger-ethics: low - Moves bytes without interpreting consent data.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';
import type { ConsentLedgerErrorCode } from '@reciprocal/consent-core';

type BodyReadResult =
  | { ok: true; value: unknown }
  | { ok: false; statusCode: number; error: string };

const sendJson = (res: ServerResponse, statusCode: number, payload: unknown): void => {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'application/json; charset=utf-8');
  res.setHeader('Cache-Control', 'no-store');
  res.end(JSON.stringify(payload));
};

const sendError = (res: ServerResponse, statusCode: number, code: string, message: string): void => {
  sendJson(res, statusCode, { error: { code, message } });
};

const ledgerErrorStatus: Record<ConsentLedgerErrorCode, number> = {
  NOT_FOUND: 404,
  UNKNOWN_RECEIPT: 404,
  DUPLICATE_RECEIPT: 409,
  ALREADY_REVOKED: 409,
  CHAIN_MISMATCH: 409,
  INVALID_SIGNATURE: 403,
  INVALID_RECEIPT: 400,
  INVALID_TIMESTAMP: 400
};

/**
 * Reads the request body as JSON, stopping as soon as it grows past maxBytes.
 */
const readJsonBody = async (req: IncomingMessage, maxBytes: number): Promise<BodyReadResult> => {
  // Enforce a lightweight body size cap before streaming anything in.
  const contentLengthHeader = req.headers['content-length'];
  if (contentLengthHeader) {
    const contentLength = Number(contentLengthHeader);
    if (Number.isFinite(contentLength) && contentLength > maxBytes) {
      return { ok: false, statusCode: 413, error: 'Payload too large' };
    }
  }

  const chunks: Buffer[] = [];
  let received = 0;
  let tooLarge = false;

  await new Promise<void>((resolve, reject) => {
    req.on('data', (chunk: Buffer) => {
      if (tooLarge) {
        return;
      }
      received += chunk.length;
      if (received > maxBytes) {
        // Stop buffering but keep draining so the response can still be written.
        tooLarge = true;
        chunks.length = 0;
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve());
    req.on('error', reject);
  });

  if (tooLarge) {
    return { ok: false, statusCode: 413, error: 'Payload too large' };
  }

  const body = Buffer.concat(chunks).toString('utf8');
  if (!body) {
    return { ok: false, statusCode: 400, error: 'Missing request body' };
  }

  try {
    return { ok: true, value: JSON.parse(body) as unknown };
  } catch {
    return { ok: false, statusCode: 400, error: 'Invalid JSON body' };
  }
};

export { ledgerErrorStatus, readJsonBody, sendError, sendJson };
export type { BodyReadResult };
