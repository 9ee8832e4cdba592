#!/usr/bin/env node
/**
 * adguard-lancache-sync - Entry Point
 *
 * Points LAN cache domains at the cache server through AdGuard Home DNS rewrites
 */
import { Application, ConfigError, configureLogger, logger } from './core/index.js';
import { loadConfig } from './config/index.js';
import { SyncScheduler } from './services/SyncScheduler.js';
import type { AppConfig } from './types/index.js';

async function main(): Promise<number> {
  let config: Readonly<AppConfig>;
  try {
    config = loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.fatal({ issues: error.issues }, 'Critical configuration error');
      for (const issue of error.issues) {
        logger.error(issue);
      }
      return 1;
    }
    throw error;
  }

  configureLogger(config.logging);

  const app = new Application(config);

  const intervalMs = config.sync.syncIntervalMs;
  if (intervalMs === undefined) {
    const outcome = await app.run();
    return outcome.exitCode;
  }

  const scheduler = new SyncScheduler(() => app.run(), intervalMs);

  const stopped = new Promise<void>((resolve) => {
    const shutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, 'Shutting down');
      await scheduler.stop();
      resolve();
    };
    process.once('SIGTERM', () => void shutdown('SIGTERM'));
    process.once('SIGINT', () => void shutdown('SIGINT'));
  });

  scheduler.start();
  await stopped;
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.fatal({ error }, 'Unexpected error');
    process.exitCode = 1;
  });
