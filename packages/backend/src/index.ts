/**
 * @description: Public exports for embedding the consent ledger HTTP API.
 * @ledger-scope: interface
 * @ledger-module: BackendExports
 * @ledger-risk: medium - Export changes can break downstream services.
 * @ledger-ethics: low - Exports are re-exports without transformation.
 */
export { createConsentServer } from './app.js';
export type { ConsentServerDeps } from './app.js';
export { loadRuntimeConfig } from './config.js';
export type { RuntimeConfig } from './config.js';
export { SimpleRateLimiter } from './services/rateLimiter.js';
export type { RateLimiterOptions, RateLimitResult } from './services/rateLimiter.js';
export { logRequest } from './utils/requestLogger.js';
export type { LogRequest } from './utils/requestLogger.js';
