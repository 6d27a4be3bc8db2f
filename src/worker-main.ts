import { loadConfig } from './config.js';
import { createContainer } from './container.js';
import { createLogger } from './logger.js';

/** Worker pool and maintenance loop without the HTTP API. */
async function start() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const { worker, maintenance } = createContainer(config, logger);

  worker.start();
  maintenance.start();
  logger.info({ concurrency: config.worker.concurrency }, 'Generation workers started');

  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, async () => {
      logger.info({ signal }, 'Shutting down workers');
      try {
        await maintenance.stop();
        await worker.shutdown(config.worker.shutdownDeadlineMs);
        process.exit(0);
      } catch (error) {
        logger.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    });
  }
}

start().catch((error: unknown) => {
  console.error('Failed to start workers:', error);
  process.exit(1);
});
