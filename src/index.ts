#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  const msg = error instanceof Error ? error.message : String(error);
  logger.error(`Fatal error: ${msg}`);
  process.exit(1);
});
