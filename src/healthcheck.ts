#!/usr/bin/env node
/**
 * Container healthcheck entry point
 */
import { Application, ConfigError, configureLogger, logger } from './core/index.js';
import { loadConfig } from './config/index.js';
import type { AppConfig } from './types/index.js';

async function main(): Promise<number> {
  let config: Readonly<AppConfig>;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error({ issues: error.issues }, 'Configuration invalid');
      return 1;
    }
    throw error;
  }

  configureLogger(config.logging);
  return new Application(config).healthcheck();
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Healthcheck failed');
    process.exitCode = 1;
  });
