/**
 * @description: Applies CORS headers for configured browser origins.
 * @ledger-scope: backend
 * @ledger-module: Cors
 * @ledger-risk: moderate - Loose origins expose write endpoints to arbitrary pages.
 * @ledger-ethics: low - Header handling only.
 */
import type { IncomingMessage, ServerResponse } from 'node:http';

const setCorsHeaders = (req: IncomingMessage, res: ServerResponse, allowedOrigins: readonly string[]): void => {
  const origin = req.headers.origin;

  // Sanitize configured allowed origins: remove wildcards, "null", and empty values.
  const sanitizedAllowedOrigins = allowedOrigins.filter(
    (o) => o !== '*' && o.toLowerCase() !== 'null' && o.trim() !== ''
  );

  const isAllowedOrigin =
    typeof origin === 'string' &&
    origin.toLowerCase() !== 'null' &&
    sanitizedAllowedOrigins.includes(origin);

  if (!isAllowedOrigin || !origin) {
    return;
  }

  res.setHeader('Access-Control-Allow-Origin', origin);
  res.setHeader('Vary', 'Origin');
  res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
  res.setHeader('Access-Control-Allow-Headers', 'Content-Type, X-Consent-Ledger-Token');
};

export { setCorsHeaders };
