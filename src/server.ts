import Fastify from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { ulid } from 'ulid';
import type { Container } from './container.js';
import { requireApiKey } from './middleware/auth.js';
import { rateLimit } from './middleware/rate-limit.js';
import { requestContext } from './plugins/request-context.js';
import { adminRoutes } from './routes/admin.js';
import { checkoutWebhookRoutes, registrationRoutes } from './routes/checkout.js';
import { jobRoutes } from './routes/jobs.js';
import { notificationRoutes } from './routes/notifications.js';

export interface ServerOptions {
  /** Clock for webhook signature windows. */
  now?: () => Date;
}

export async function createServer(container: Container, options: ServerOptions = {}) {
  const { config, logger } = container;

  const app = Fastify({
    loggerInstance: logger,
    genReqId: () => ulid(),
  });

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // CORS (dev-friendly)
  if (config.corsDev) {
    await app.register(cors, {
      origin: ['http://localhost:3000', 'http://localhost:5173'],
      credentials: true,
    });
  }

  await app.register(requestContext);

  // Health endpoint with store, queue and worker stats
  app.get('/health', async () => {
    const [jobs, queue] = await Promise.all([container.store.getStats(), container.queue.depth()]);
    return {
      ok: true,
      ...jobs,
      queue,
      worker: config.worker.enabled ? container.worker.getStats() : null,
      store: { kind: config.store.kind },
    };
  });

  await app.register(async (api) => {
    api.addHook('preHandler', requireApiKey(config.apiKey));

    await api.register(jobRoutes({ jobs: container.jobs, enqueueGuard: rateLimit(config.rateLimit) }));
    await api.register(notificationRoutes(container.notifications));
    await api.register(registrationRoutes(container.registrations));
    await api.register(adminRoutes(container.queue));
  });

  await app.register(checkoutWebhookRoutes({
    trigger: container.trigger,
    secret: config.webhook.secret,
    toleranceSeconds: config.webhook.toleranceSeconds,
    now: options.now,
  }));

  if (config.worker.enabled) {
    container.worker.start();
    container.maintenance.start();
  }

  app.addHook('onClose', async () => {
    await container.maintenance.stop();
    await container.worker.shutdown(config.worker.shutdownDeadlineMs);
  });

  return app;
}
