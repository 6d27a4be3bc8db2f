import type { Logger } from '../logger.js';
import type { BatchCoordinator } from '../batch/coordinator.js';
import { NotFoundError, errorMessage } from '../errors.js';
import type { TaskQueue } from '../queue/base.js';
import type { JobStore } from '../repositories/base.js';
import type { CreateJobRequest, JobQueryRequest, LessonRequest } from '../schemas/job.js';
import { isWorkJobType, type GenerationJob, type TenantContext } from '../types/job.js';

export interface JobServiceDeps {
  store: JobStore;
  queue: TaskQueue;
  batch: BatchCoordinator;
  logger: Logger;
}

/** Tenant-scoped job operations behind the HTTP routes. */
export class JobService {
  private logger: Logger;

  constructor(private deps: JobServiceDeps) {
    this.logger = deps.logger.child({ component: 'job-service' });
  }

  async createJob(context: TenantContext, request: CreateJobRequest): Promise<GenerationJob> {
    const job = await this.deps.store.create({
      tenantId: context.tenantId,
      createdByUserId: context.userId,
      input: request.input,
      maxRetries: request.maxRetries,
    });
    this.logger.info({ jobId: job.id, tenantId: job.tenantId, type: job.type }, 'Job created');
    await this.enqueue(job);
    return job;
  }

  /** A job of another tenant is reported as missing. */
  async getJob(context: TenantContext, jobId: string): Promise<GenerationJob> {
    const job = await this.deps.store.get(jobId);
    if (!job || job.tenantId !== context.tenantId) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  async listJobs(context: TenantContext, query: JobQueryRequest): Promise<{ jobs: GenerationJob[]; nextCursor?: string }> {
    return this.deps.store.find({ ...query, tenantId: context.tenantId });
  }

  /**
   * Cancels a queued or processing job; a terminal job comes back unchanged.
   * Cancelling a batch parent cancels its unfinished children too.
   */
  async cancelJob(context: TenantContext, jobId: string): Promise<GenerationJob> {
    await this.getJob(context, jobId);
    const { job, changed } = await this.deps.store.cancel(jobId);
    if (!changed) return job;

    const logger = this.logger.child({ jobId, tenantId: job.tenantId });
    logger.info({ type: job.type }, 'Job cancelled');

    if (job.type === 'FULL_COURSE') {
      const children = await this.deps.store.cancelChildren(job.id);
      logger.info({ cancelled: children.length }, 'Cancelled batch children');
    } else if (job.parentJobId !== null) {
      try {
        await this.deps.batch.onChildTerminal(job.parentJobId);
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Failed to aggregate parent after cancellation');
      }
    }
    return job;
  }

  /** Requeues a FAILED job with a fresh retry budget. */
  async retryJob(context: TenantContext, jobId: string): Promise<GenerationJob> {
    await this.getJob(context, jobId);
    const job = await this.deps.store.retry(jobId);
    this.logger.info({ jobId, tenantId: job.tenantId }, 'Job queued for retry');
    await this.enqueue(job);
    return job;
  }

  async generateAllLessons(context: TenantContext, courseId: string, lessons: readonly LessonRequest[]): Promise<GenerationJob> {
    const { parent } = await this.deps.batch.fanOut(context, courseId, lessons);
    return parent;
  }

  private async enqueue(job: GenerationJob): Promise<void> {
    if (!isWorkJobType(job.type)) return;
    try {
      await this.deps.queue.enqueue({ type: job.type, payload: { jobId: job.id } });
    } catch (error) {
      // The job is durable; workers sweep the store for it
      this.logger.warn({ jobId: job.id, error: errorMessage(error) }, 'Failed to enqueue job task');
    }
  }
}
