#!/usr/bin/env node
import { runCLI } from './lib/cli';
import { Logger } from './lib/logger';

const { logger, consoleSink } = Logger.createCLILogger();

runCLI(process.argv.slice(2), { logger, consoleSink }).then(
  (exitCode) => logger.exit(exitCode),
  (error: unknown) => {
    logger.errorObject('Unexpected failure', error);
    logger.exit(1);
  },
);
