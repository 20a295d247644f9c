#!/usr/bin/env tsx
/**
 * CLI entry point. One short per invocation, then exit.
 */
import { runCli } from './cli.js';
import { logger } from './utils/logger.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err) => {
  logger.error('Fatal', { err });
  process.exit(1);
});
