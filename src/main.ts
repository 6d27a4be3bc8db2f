import { loadConfig } from './config.js';
import { createContainer } from './container.js';
import { createLogger } from './logger.js';
import { createServer } from './server.js';

async function start() {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const app = await createServer(createContainer(config, logger));

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port, workers: config.worker.enabled }, 'Generation jobs service started');

  // Graceful shutdown
  const signals = ['SIGINT', 'SIGTERM'] as const;
  for (const signal of signals) {
    process.once(signal, async () => {
      app.log.info({ signal }, 'Shutting down');
      try {
        await app.close();
        process.exit(0);
      } catch (error) {
        app.log.error({ err: error }, 'Error during shutdown');
        process.exit(1);
      }
    });
  }
}

start().catch((error: unknown) => {
  console.error('Failed to start server:', error);
  process.exit(1);
});
