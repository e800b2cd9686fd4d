/**
 * @description: Resolves the client address used as the write rate-limit key.
 * @ledger-scope: utility
 * @ledger-module: ClientIp
 * @ledger-risk: moderate - Trusting spoofed proxy headers lets clients dodge rate limits.
 * @ledger-ethics: low - Addresses are used as limiter keys and never logged.
 */
import type { IncomingMessage } from 'node:http';

// --- Client IP parsing ---
const getClientIp = (req: IncomingMessage, trustProxy: boolean): string => {
  let clientIp = req.socket.remoteAddress || 'unknown';

  // Honor reverse proxy headers only when explicitly enabled.
  if (trustProxy) {
    const forwardedFor = req.headers['x-forwarded-for'];
    if (typeof forwardedFor === 'string' && forwardedFor.length > 0) {
      clientIp = forwardedFor.split(',')[0].trim();
    } else if (Array.isArray(forwardedFor) && forwardedFor.length > 0) {
      clientIp = forwardedFor[0].trim();
    }
  }

  if (clientIp.startsWith('::ffff:')) {
    clientIp = clientIp.substring(7);
  }

  return clientIp;
};

export { getClientIp };
