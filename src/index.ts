#!/usr/bin/env node

import { SecretLoaderApp } from './app';
import { parseCliArguments } from './cli';
import { Logger } from './utils/logger';

export async function main(): Promise<void> {
  const cliOptions = parseCliArguments();
  const logger = new Logger(cliOptions.logLevel);
  const app = new SecretLoaderApp(cliOptions, {}, logger);

  try {
    app.initialize();
    await app.load();

    if (cliOptions.printKeys) {
      logger.info(`Loaded keys: ${app.getValues().keys().join(', ')}`);
    }

    if (cliOptions.once) {
      return;
    }

    // Handle graceful shutdown
    const shutdown = (signal: string): void => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      app.stop();
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));

    const failure = await app.waitForStop();
    if (failure) {
      logger.error(`Secret renewal stopped: ${failure.message}`);
      process.exit(1);
    }
  } catch (error) {
    logger.error('Error:', error);
    process.exit(1);
  }
}

// Only run main if this file is executed directly (not imported)
if (require.main === module) {
  main().catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
}
