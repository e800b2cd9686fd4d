/**
 * @description: Centralizes backend runtime configuration defaults and env parsing.
 * @ledger-scope: utility
 * @ledger-module: BackendRuntimeConfig
 * @ledger-risk: moderate - Misconfiguration can break API behavior or security controls.
 * @ledger-ethics: moderate - Incorrect defaults can weaken abuse protections on consent writes.
 */
type RuntimeConfig = {
  server: {
    port: number;
    host: string;
    trustProxy: boolean;
  };
  api: {
    writeToken: string | null;
    maxBodyBytes: number;
    rateLimit: {
      limit: number;
      window: number;
    };
  };
  cors: {
    allowedOrigins: string[];
  };
};

// --- Helpers ---
const parseCsvEnv = (value: string | undefined, fallback: string[]): string[] => {
  if (!value) {
    return [...fallback];
  }

  const entries = value
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);

  return entries.length > 0 ? entries : [...fallback];
};

// Guard numeric settings to sane positive values.
const parsePositiveIntEnv = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value || String(fallback), 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

// --- Defaults ---
const defaultAllowedOrigins = [
  'http://localhost:8080',
  'http://localhost:3000'
];

// --- Runtime config ---
const loadRuntimeConfig = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => ({
  server: {
    port: parsePositiveIntEnv(env.PORT, 3000),
    host: env.HOST || '::',
    trustProxy: env.CONSENT_TRUST_PROXY === 'true'
  },
  api: {
    writeToken: env.CONSENT_API_WRITE_TOKEN?.trim() || null,
    maxBodyBytes: parsePositiveIntEnv(env.CONSENT_API_MAX_BODY_BYTES, 64000),
    rateLimit: {
      limit: parsePositiveIntEnv(env.CONSENT_API_RATE_LIMIT, 30),
      window: parsePositiveIntEnv(env.CONSENT_API_RATE_LIMIT_WINDOW_MS, 60000)
    }
  },
  cors: {
    allowedOrigins: parseCsvEnv(env.CONSENT_ALLOWED_ORIGINS, defaultAllowedOrigins)
  }
});

export { loadRuntimeConfig };
export type { RuntimeConfig };
