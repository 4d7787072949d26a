#!/usr/bin/env node
/**
 * docextract - CLI Entry Point
 *
 * Usage:
 *   docextract ingest ./statement.pdf --type bank_statement
 *   docextract run <documentId>
 *   docextract status <documentId>
 *
 * @module bin
 */

import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

// First existing .env wins: DOCEXTRACT_ENV_FILE, then CWD, then package root
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.DOCEXTRACT_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

// Imported after .env is applied; storage defaults read the environment at load
const { runCli } = await import('./cli.js');

runCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('[CLI] Fatal error:', error);
    process.exit(1);
  });
