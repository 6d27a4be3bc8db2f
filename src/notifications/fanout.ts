import type { Logger } from '../logger.js';
import { errorMessage } from '../errors.js';
import type { GenerationJob, GenerationJobType } from '../types/job.js';
import type { NotificationPublisher } from './publisher.js';
import type { NotificationRepository } from './repository.js';
import { userChannel, type CreateNotificationData, type Notification } from './types.js';

const JOB_LABELS: Record<GenerationJobType, string> = {
  SME_INGESTION: 'Knowledge Ingestion',
  COURSE_OUTLINE: 'Course Outline',
  LESSON_CONTENT: 'Lesson Content',
  COMPONENT_REGEN: 'Component',
  FULL_COURSE: 'Course Lessons',
};

export type JobMilestone = 'started' | 'completed' | 'failed';

export function milestoneNotification(job: GenerationJob, milestone: JobMilestone): CreateNotificationData {
  const label = JOB_LABELS[job.type];
  const refs = {
    tenantId: job.tenantId,
    userId: job.createdByUserId,
    jobId: job.id,
    ...(job.courseId !== null && { courseId: job.courseId }),
    ...(job.smeTaskId !== null && { taskId: job.smeTaskId }),
    ...(job.input.type === 'SME_INGESTION' && { smeId: job.input.smeId }),
  };

  switch (milestone) {
    case 'started':
      return {
        ...refs,
        type: 'generation_started',
        priority: 'low',
        title: `${label} Generation Started`,
        message: job.progressMessage,
      };
    case 'completed':
      return {
        ...refs,
        type: job.type === 'SME_INGESTION' ? 'ingestion_complete' : job.type === 'COURSE_OUTLINE' ? 'outline_ready' : 'generation_complete',
        priority: 'normal',
        title: job.type === 'COURSE_OUTLINE' ? 'Course Outline Ready' : `${label} Generation Complete`,
        message: job.errorMessage ?? `${label} finished successfully`,
      };
    case 'failed':
      return {
        ...refs,
        type: job.type === 'SME_INGESTION' ? 'ingestion_failed' : 'generation_failed',
        priority: 'high',
        title: `${label} Generation Failed`,
        message: job.errorMessage ?? 'Generation failed',
      };
  }
}

/**
 * Writes a notification row for a job milestone, then best-effort publishes it
 * on the owner's channel. The row is the record; a failed publish is logged
 * and dropped. Children of a batch never notify on their own.
 */
export class NotificationFanout {
  private logger: Logger;

  constructor(
    private repository: NotificationRepository,
    private publisher: NotificationPublisher,
    logger: Logger
  ) {
    this.logger = logger.child({ component: 'notifications' });
  }

  async notify(data: CreateNotificationData): Promise<Notification> {
    const notification = await this.repository.create(data);

    try {
      await this.publisher.publish(userChannel(data.tenantId, data.userId), { eventType: 'created', notification });
    } catch (error) {
      this.logger.warn(
        { tenantId: data.tenantId, notificationId: notification.id, error: errorMessage(error) },
        'Real-time publish failed'
      );
    }
    return notification;
  }

  async jobMilestone(job: GenerationJob, milestone: JobMilestone): Promise<Notification | null> {
    if (job.parentJobId !== null) return null;
    return this.notify(milestoneNotification(job, milestone));
  }

  /** Notifies the terminal milestone of a job; cancellations are silent. */
  async jobFinished(job: GenerationJob): Promise<Notification | null> {
    if (job.status === 'COMPLETED') return this.jobMilestone(job, 'completed');
    if (job.status === 'FAILED') return this.jobMilestone(job, 'failed');
    return null;
  }
}
