import { loadConfig } from './config.js';
import { createAppContext } from './context.js';
import logger, { applyLogLevel } from './lib/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();
  applyLogLevel(config.logLevel);
  logger.info({ dataDir: config.dataDir, databasePath: config.databasePath }, 'Starting Dockhand reconciler');

  const context = createAppContext(config);

  if (config.previousEncryptionKeys.length > 0) {
    context.projects.reencryptCredentials();
  }

  if (!config.watcher.enabled) {
    logger.info('Watcher disabled, nothing to run');
    context.close();
    return;
  }

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    logger.info({ signal }, 'Shutting down...');
    controller.abort();
    context.processRunner.terminateAll();
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  // Resolves once the signal aborts the loop
  await context.watcher.start(controller.signal);
  context.close();
  logger.info('Shutdown complete');
}

main().catch((err) => {
  logger.fatal({ err }, 'Failed to start reconciler');
  process.exit(1);
});
