import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../errors.js';
import { validateParams, validateQuery } from '../middleware/validation.js';
import type { TaskQueue } from '../queue/base.js';

const DeadLetterQuerySchema = z.object({
  limit: z.preprocess(
    (val) => val === undefined ? 100 : Number(val),
    z.number().int().min(1).max(500)
  ).default(100),
});

const TaskParamsSchema = z.object({
  taskId: z.string().min(1),
});

/** Operator view of tasks that exhausted their deliveries. */
export function adminRoutes(queue: TaskQueue): FastifyPluginAsync {
  return async (app) => {
    app.get('/admin/dead-letters', async (request) => {
      const { limit } = validateQuery(DeadLetterQuerySchema, request);
      return { tasks: await queue.listDeadLetters(limit) };
    });

    app.post('/admin/dead-letters/:taskId/requeue', async (request) => {
      const { taskId } = validateParams(TaskParamsSchema, request);
      const task = await queue.requeueDeadLetter(taskId);
      if (!task) {
        throw new NotFoundError('Dead letter', taskId);
      }
      return { task };
    });
  };
}
