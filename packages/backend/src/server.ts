/**
 * @description: Starts the consent ledger API: opens the ledger, wires rate limiting and listens.
 * @ledger-scope: core
 * @ledger-module: ServerBootstrap
 * @ledger-risk: high - Startup failures leave the ledger unreachable.
 * @ledger-ethics: moderate - Refuses to serve when the ledger cannot be opened.
 */
// Must stay first so later modules see values from .env.
import './env.js';

import { getDefaultConsentLedger, logger } from '@reciprocal/shared';
import { createConsentServer } from './app.js';
import { loadRuntimeConfig } from './config.js';
import { SimpleRateLimiter } from './services/rateLimiter.js';
import { logRequest } from './utils/requestLogger.js';

const RATE_LIMIT_CLEANUP_MS = 2 * 60 * 1000;

const start = async (): Promise<void> => {
  const config = loadRuntimeConfig();

  // --- Environment visibility ---
  logger.info('Environment variables check:');
  logger.info(`CONSENT_LEDGER_BACKEND: ${process.env.CONSENT_LEDGER_BACKEND || 'sqlite (default)'}`);
  logger.info(`CONSENT_API_WRITE_TOKEN: ${config.api.writeToken ? 'SET' : 'NOT SET'}`);
  logger.info(`NODE_ENV: ${process.env.NODE_ENV || 'NOT SET'}`);
  if (!config.api.writeToken) {
    logger.warn('CONSENT_API_WRITE_TOKEN is not set; write endpoints accept unauthenticated requests.');
  }

  const ledger = await getDefaultConsentLedger();
  const writeLimiter = new SimpleRateLimiter(config.api.rateLimit);

  // Background cleanup keeps the limiter map from growing forever.
  const cleanupTimer = setInterval(() => writeLimiter.cleanup(), RATE_LIMIT_CLEANUP_MS);
  cleanupTimer.unref();

  const server = createConsentServer({ ledger, config, writeLimiter, logRequest });

  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}; closing consent ledger server`);
    clearInterval(cleanupTimer);
    server.close(() => {
      ledger
        .close()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error(`Failed to close ledger: ${error instanceof Error ? error.message : String(error)}`);
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  server.listen(config.server.port, config.server.host, () => {
    logger.info(`Consent ledger available on ${config.server.host}:${config.server.port}`);
  });
};

start().catch((error: unknown) => {
  logger.error(`Failed to start consent ledger: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
