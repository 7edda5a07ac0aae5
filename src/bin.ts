#!/usr/bin/env node
/**
 * Storage Provisioner - CLI Entry Point
 *
 * Invoked by the package's maintainer scripts:
 *
 *   storage-provisioner configure              # fresh install
 *   storage-provisioner configure 2.5-3        # upgrade from 2.5-3
 *   storage-provisioner abort-upgrade 2.13-1
 *   storage-provisioner plan 2.5-3             # list the steps an upgrade would run
 *
 * @module bin
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';
import { runCli } from './cli.js';

// Load .env from the first candidate that exists:
// 1. PROVISION_ENV_FILE (explicit override)
// 2. CWD/.env
// 3. Package root/.env
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.PROVISION_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath, quiet: true });
    break;
  }
}

runCli(process.argv.slice(2)).then(
  (exitCode) => {
    process.exitCode = exitCode;
  },
  (error: unknown) => {
    console.error('[Provision] Fatal error:', error);
    process.exitCode = 1;
  }
);
