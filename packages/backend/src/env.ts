/**
 * @description: Loads a repository-level .env file before any module reads process.env.
 * @ledger-scope: utility
 * @ledger-module: EnvBootstrap
 * @ledger-risk: low - A missing file falls back to the process environment.
 * @ledger-ethics: low - Configuration only.
 */
import fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import dotenv from 'dotenv';

// Only load the file when it exists; otherwise process.env is used as given.
const envPath = fileURLToPath(new URL('../../../.env', import.meta.url));
if (fs.existsSync(envPath)) {
  dotenv.config({ path: envPath });
}

export { envPath };
