#!/usr/bin/env node

/**
 * Event Loop Guard Scan CLI
 *
 * Usage:
 *   event-loop-guard-scan src/handlers/*.ts            # Text report
 *   event-loop-guard-scan src/app.ts --json --policy   # JSON, with policy check
 */

import { parseScanArgs, runScan } from './scan-command.js';

async function main(): Promise<void> {
  const args = parseScanArgs(process.argv.slice(2));
  const exitCode = await runScan(args, {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
  });
  process.exitCode = exitCode;
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(2);
});
