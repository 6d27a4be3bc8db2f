import type { FastifyPluginAsync, FastifyReply, FastifyRequest } from 'fastify';
import { requireTenant, tenantOf } from '../middleware/tenant.js';
import { validateBody, validateParams, validateQuery } from '../middleware/validation.js';
import {
  CourseParamsSchema,
  CreateJobSchema,
  GenerateAllLessonsSchema,
  JobParamsSchema,
  JobQuerySchema,
} from '../schemas/job.js';
import type { JobService } from '../services/job-service.js';
import { toWire } from '../types/job.js';

export type RequestGuard = (request: FastifyRequest, reply: FastifyReply) => Promise<void>;

export interface JobRoutesOptions {
  jobs: JobService;
  /** Runs before the routes that enqueue work. */
  enqueueGuard: RequestGuard;
}

export function jobRoutes({ jobs, enqueueGuard }: JobRoutesOptions): FastifyPluginAsync {
  return async (app) => {
    app.addHook('preHandler', requireTenant);

    // POST /jobs - Create a job and enqueue it
    app.post('/jobs', { preHandler: enqueueGuard }, async (request, reply) => {
      const body = validateBody(CreateJobSchema, request);
      const job = await jobs.createJob(tenantOf(request), body);
      reply.code(201);
      return { job: toWire(job) };
    });

    // GET /jobs - List the tenant's jobs, newest first
    app.get('/jobs', async (request) => {
      const query = validateQuery(JobQuerySchema, request);
      const result = await jobs.listJobs(tenantOf(request), query);
      return {
        jobs: result.jobs.map(toWire),
        nextCursor: result.nextCursor,
      };
    });

    app.get('/jobs/:jobId', async (request) => {
      const { jobId } = validateParams(JobParamsSchema, request);
      const job = await jobs.getJob(tenantOf(request), jobId);
      return { job: toWire(job) };
    });

    app.post('/jobs/:jobId/cancel', async (request) => {
      const { jobId } = validateParams(JobParamsSchema, request);
      const job = await jobs.cancelJob(tenantOf(request), jobId);
      return { job: toWire(job) };
    });

    app.post('/jobs/:jobId/retry', { preHandler: enqueueGuard }, async (request) => {
      const { jobId } = validateParams(JobParamsSchema, request);
      const job = await jobs.retryJob(tenantOf(request), jobId);
      return {
        message: 'Job queued for retry',
        job: toWire(job),
      };
    });

    // POST /courses/:courseId/generate-all - Fan out one lesson job per lesson
    app.post('/courses/:courseId/generate-all', { preHandler: enqueueGuard }, async (request, reply) => {
      const { courseId } = validateParams(CourseParamsSchema, request);
      const { lessons } = validateBody(GenerateAllLessonsSchema, request);
      const job = await jobs.generateAllLessons(tenantOf(request), courseId, lessons);
      reply.code(202);
      return { job: toWire(job) };
    });
  };
}
