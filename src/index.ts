/**
 * Report Authors CLI
 *
 * Extracts analyst names, titles and emails from research-report PDFs
 * with a local Ollama vision model and merges them into a CSV table.
 *
 * @module index
 */

import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { fileURLToPath } from 'url';

// .env candidates, first found wins:
// 1. REPORT_AUTHORS_ENV_FILE
// 2. CWD/.env
// 3. package root/.env
const __dirname = path.dirname(fileURLToPath(import.meta.url));
const envCandidates = [
  process.env.REPORT_AUTHORS_ENV_FILE,
  path.resolve(process.cwd(), '.env'),
  path.resolve(__dirname, '..', '..', '.env'),
].filter((p): p is string => typeof p === 'string');

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
    break;
  }
}

import { main } from './cli/main.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
