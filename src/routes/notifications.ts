import type { FastifyPluginAsync } from 'fastify';
import { requireTenant, tenantOf } from '../middleware/tenant.js';
import { validateBody, validateQuery } from '../middleware/validation.js';
import type { NotificationRepository } from '../notifications/repository.js';
import { MarkReadSchema, NotificationQuerySchema } from '../notifications/types.js';

/** The caller's own notifications; every route is scoped to tenant and user. */
export function notificationRoutes(notifications: NotificationRepository): FastifyPluginAsync {
  return async (app) => {
    app.addHook('preHandler', requireTenant);

    app.get('/notifications', async (request) => {
      const { tenantId, userId } = tenantOf(request);
      const query = validateQuery(NotificationQuerySchema, request);
      return notifications.list(tenantId, userId, query);
    });

    app.get('/notifications/unread-count', async (request) => {
      const { tenantId, userId } = tenantOf(request);
      return { count: await notifications.unreadCount(tenantId, userId) };
    });

    app.post('/notifications/read', async (request) => {
      const { tenantId, userId } = tenantOf(request);
      const { ids } = validateBody(MarkReadSchema, request);
      return { updated: await notifications.markAsRead(tenantId, userId, ids) };
    });

    app.post('/notifications/read-all', async (request) => {
      const { tenantId, userId } = tenantOf(request);
      return { updated: await notifications.markAllAsRead(tenantId, userId) };
    });
  };
}
