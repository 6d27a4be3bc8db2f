import type { Logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { NotificationFanout } from '../notifications/fanout.js';
import type { TaskQueue } from '../queue/base.js';
import type { JobStore } from '../repositories/base.js';
import type { LessonRequest } from '../schemas/job.js';
import { isTerminal, type CreateJobData, type GenerationJob, type TenantContext } from '../types/job.js';
import type { AggregationPolicy } from './aggregation.js';

export interface BatchCoordinatorOptions {
  store: JobStore;
  queue: TaskQueue;
  notifier: NotificationFanout;
  policy: AggregationPolicy;
  logger: Logger;
  now?: () => Date;
}

/**
 * Fans a course out into one LESSON_CONTENT child per lesson under a
 * FULL_COURSE parent, and folds child outcomes back into the parent.
 */
export class BatchCoordinator {
  private logger: Logger;
  private now: () => Date;

  constructor(private options: BatchCoordinatorOptions) {
    this.logger = options.logger.child({ component: 'batch' });
    this.now = options.now ?? (() => new Date());
  }

  get policy(): AggregationPolicy {
    return this.options.policy;
  }

  async fanOut(
    context: TenantContext,
    courseId: string,
    lessons: readonly LessonRequest[]
  ): Promise<{ parent: GenerationJob; children: GenerationJob[] }> {
    const base = { tenantId: context.tenantId, createdByUserId: context.userId };
    const childData = lessons.map((lesson): CreateJobData => ({
      ...base,
      input: { type: 'LESSON_CONTENT', courseId, ...lesson },
    }));

    const batch = await this.options.store.createBatch(
      { ...base, input: { type: 'FULL_COURSE', courseId, lessonCount: lessons.length }, maxRetries: 0 },
      childData
    );
    const logger = this.logger.child({ jobId: batch.parent.id, tenantId: context.tenantId });
    logger.info({ courseId, lessons: batch.children.length }, 'Lesson batch created');

    try {
      await this.options.notifier.jobMilestone(batch.parent, 'started');
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Batch start notification failed');
    }

    for (const child of batch.children) {
      try {
        await this.options.queue.enqueue({ type: 'LESSON_CONTENT', payload: { jobId: child.id } });
      } catch (error) {
        // The sweep still claims the child from the store
        logger.warn({ childJobId: child.id, error: errorMessage(error) }, 'Failed to enqueue lesson task');
      }
    }

    return batch;
  }

  /**
   * Re-aggregates the parent after a child reached a terminal state. Safe to
   * call any number of times; only the call that moves the parent notifies.
   */
  async onChildTerminal(parentJobId: string): Promise<GenerationJob> {
    const { job: parent, changed } = await this.options.store.finalizeParent(parentJobId, {
      policy: this.options.policy,
      now: this.now(),
    });
    if (!changed || !isTerminal(parent.status)) {
      return parent;
    }

    const logger = this.logger.child({ jobId: parent.id, tenantId: parent.tenantId });
    logger.info({ status: parent.status, errorMessage: parent.errorMessage }, 'Lesson batch finished');

    if (parent.status === 'FAILED' && this.options.policy === 'fail-fast') {
      const cancelled = await this.options.store.cancelChildren(parent.id, this.now());
      if (cancelled.length > 0) {
        logger.info({ cancelled: cancelled.length }, 'Cancelled remaining lessons after a failure');
      }
    }

    try {
      await this.options.notifier.jobFinished(parent);
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Batch completion notification failed');
    }
    return parent;
  }
}
