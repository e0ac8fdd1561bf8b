#!/usr/bin/env npx tsx

/**
 * tokensum CLI
 *
 * Commands:
 *   tokensum start           — Start the HTTP server (default)
 *   tokensum generate        — Print a single token
 *   tokensum tokens <text>   — Print checksum and per-word tokens for text
 *   tokensum openapi         — Print the OpenAPI document
 */

import 'dotenv/config';
import { runCli } from './commands.js';

async function main() {
  const code = await runCli(process.argv.slice(2));
  if (code !== 0) process.exit(code);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
