#!/usr/bin/env node
import { EXIT_FATAL, runCli } from './app';
import { loadEnvFile } from './config';
import { logger } from './telemetry/logger';

loadEnvFile();

runCli(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((error) => {
    logger.fatal({ error }, 'Unhandled failure');
    process.exit(EXIT_FATAL);
  });
