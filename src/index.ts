#!/usr/bin/env node

import { runCLI } from './cli.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const result = await runCLI(args);

  switch (result) {
    case 'handled':
      process.exit(process.exitCode ?? 0);
      break;
    case 'server':
      // The HTTP server keeps the process alive
      break;
  }
}

main().catch((error: unknown) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
