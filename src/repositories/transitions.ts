import { ulid } from 'ulid';
import { ValidationError, InvalidStateError } from '../errors.js';
import { JobInputSchema } from '../schemas/job.js';
import { aggregateChildren, type AggregationPolicy } from '../batch/aggregation.js';
import type { BackoffPolicy } from '../lib/backoff.js';
import type { CreateJobData, GenerationJob, GenerationJobType, JobInput, JobOutcome, JobStatus } from '../types/job.js';

// State transitions shared by every JobStore backend. Each returns the next
// version of the job, or null when the transition is a no-op for its state.

const CORRELATION_FIELDS = new Set(['courseId', 'lessonId', 'smeTaskId', 'smeId']);

export const DEFAULT_MAX_RETRIES = 3;

export function parseJobInput(input: unknown): JobInput {
  const parsed = JobInputSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const missingRef = parsed.error.issues.find(
    (issue) => issue.path.length === 1 && CORRELATION_FIELDS.has(String(issue.path[0]))
  );
  if (missingRef) {
    throw new ValidationError(`Missing correlation reference: ${String(missingRef.path[0])}`, {
      issues: parsed.error.issues,
    });
  }
  throw new ValidationError('Invalid job input', { issues: parsed.error.issues });
}

export function correlationRefs(input: JobInput): Pick<GenerationJob, 'courseId' | 'lessonId' | 'smeTaskId' | 'submissionId'> {
  switch (input.type) {
    case 'SME_INGESTION':
      return { courseId: null, lessonId: null, smeTaskId: input.smeTaskId, submissionId: input.submissionId ?? null };
    case 'COURSE_OUTLINE':
    case 'FULL_COURSE':
      return { courseId: input.courseId, lessonId: null, smeTaskId: null, submissionId: null };
    case 'LESSON_CONTENT':
    case 'COMPONENT_REGEN':
      return { courseId: input.courseId, lessonId: input.lessonId, smeTaskId: null, submissionId: null };
  }
}

export function newJob(
  data: CreateJobData,
  options: { id?: string; now: Date; status?: 'QUEUED' | 'PROCESSING'; parentJobId?: string; progressMessage?: string }
): GenerationJob {
  if (!data.tenantId) {
    throw new ValidationError('tenantId is required');
  }
  const input = parseJobInput(data.input);
  const status = options.status ?? 'QUEUED';

  return {
    id: options.id ?? ulid(),
    tenantId: data.tenantId,
    type: input.type,
    status,
    progressPercent: 0,
    progressMessage: options.progressMessage ?? 'Queued',
    resultPath: null,
    errorMessage: null,
    tokensUsed: 0,
    retryCount: 0,
    maxRetries: data.maxRetries ?? DEFAULT_MAX_RETRIES,
    parentJobId: options.parentJobId ?? null,
    ...correlationRefs(input),
    input,
    createdByUserId: data.createdByUserId,
    createdAt: options.now,
    updatedAt: options.now,
    startedAt: status === 'PROCESSING' ? options.now : null,
    completedAt: null,
    nextAttemptAt: null,
    version: 1,
  };
}

function next(job: GenerationJob, now: Date, changes: Partial<GenerationJob>): GenerationJob {
  return { ...job, ...changes, updatedAt: now, version: job.version + 1 };
}

export function isClaimable(job: GenerationJob, now: Date, capabilities?: readonly GenerationJobType[]): boolean {
  return job.status === 'QUEUED' &&
    job.type !== 'FULL_COURSE' &&
    (job.nextAttemptAt === null || job.nextAttemptAt.getTime() <= now.getTime()) &&
    (capabilities === undefined || capabilities.includes(job.type));
}

export function claimJob(job: GenerationJob, now: Date): GenerationJob | null {
  if (!isClaimable(job, now)) return null;
  return next(job, now, {
    status: 'PROCESSING',
    startedAt: now,
    nextAttemptAt: null,
    progressMessage: 'Processing',
  });
}

/**
 * Whether the attempt that claimed the job at `claimedAt` still holds it. A
 * reclaim and re-claim gives the job a new `startedAt`, so writes from the
 * earlier attempt stop matching.
 */
export function heldBy(job: GenerationJob, claimedAt?: Date): boolean {
  return claimedAt === undefined || job.startedAt?.getTime() === claimedAt.getTime();
}

export function progressJob(job: GenerationJob, percent: number, message: string, now: Date, claimedAt?: Date): GenerationJob {
  if (job.status !== 'PROCESSING') {
    throw new InvalidStateError(`Cannot update progress of a ${job.status} job`, { jobId: job.id, status: job.status });
  }
  if (!heldBy(job, claimedAt)) {
    throw new InvalidStateError('Job was claimed by a later attempt', { jobId: job.id });
  }
  const clamped = Math.min(Math.max(Math.round(percent), 0), 100);
  return next(job, now, {
    progressPercent: Math.max(job.progressPercent, clamped),
    progressMessage: message,
  });
}

export function completeJob(job: GenerationJob, outcome: JobOutcome, now: Date, claimedAt?: Date): GenerationJob | null {
  if (job.status !== 'PROCESSING' || !heldBy(job, claimedAt)) return null;
  return next(job, now, {
    status: 'COMPLETED',
    progressPercent: 100,
    progressMessage: 'Completed',
    resultPath: outcome.resultPath,
    tokensUsed: job.tokensUsed + outcome.tokensUsed,
    errorMessage: null,
    completedAt: now,
  });
}

export interface FailOptions {
  message: string;
  retryable: boolean;
  now: Date;
  /** `startedAt` of the failing attempt; a stale attempt leaves the job alone. */
  claimedAt?: Date;
}

export function failJob(job: GenerationJob, options: FailOptions, backoff: BackoffPolicy): GenerationJob | null {
  if (job.status !== 'PROCESSING' || !heldBy(job, options.claimedAt)) return null;

  if (options.retryable && job.retryCount < job.maxRetries) {
    const retryCount = job.retryCount + 1;
    return next(job, options.now, {
      status: 'QUEUED',
      retryCount,
      errorMessage: options.message,
      progressPercent: 0,
      progressMessage: `Retry ${retryCount} of ${job.maxRetries} scheduled`,
      startedAt: null,
      nextAttemptAt: new Date(options.now.getTime() + backoff(retryCount)),
    });
  }

  return next(job, options.now, {
    status: 'FAILED',
    errorMessage: options.message,
    progressMessage: 'Failed',
    completedAt: options.now,
  });
}

export function cancelJob(job: GenerationJob, now: Date): GenerationJob | null {
  if (job.status !== 'QUEUED' && job.status !== 'PROCESSING') return null;
  return next(job, now, {
    status: 'CANCELLED',
    progressMessage: 'Cancelled',
    nextAttemptAt: null,
    completedAt: now,
  });
}

export function retryJob(job: GenerationJob, now: Date): GenerationJob {
  if (job.status !== 'FAILED') {
    throw new InvalidStateError('Only failed jobs can be retried', { jobId: job.id, status: job.status });
  }
  if (job.type === 'FULL_COURSE') {
    throw new InvalidStateError('Batch parent jobs cannot be retried; retry the failed lessons instead', { jobId: job.id });
  }
  return next(job, now, {
    status: 'QUEUED',
    retryCount: 0,
    errorMessage: null,
    progressPercent: 0,
    progressMessage: 'Queued for retry',
    startedAt: null,
    completedAt: null,
    nextAttemptAt: null,
  });
}

export function isStale(job: GenerationJob, olderThan: Date): boolean {
  return job.status === 'PROCESSING' &&
    job.type !== 'FULL_COURSE' &&
    job.startedAt !== null &&
    job.startedAt.getTime() < olderThan.getTime();
}

export function reclaimJob(job: GenerationJob, now: Date): GenerationJob | null {
  if (job.status !== 'PROCESSING') return null;

  if (job.retryCount < job.maxRetries) {
    return next(job, now, {
      status: 'QUEUED',
      retryCount: job.retryCount + 1,
      progressPercent: 0,
      progressMessage: 'Requeued after worker timeout',
      startedAt: null,
      nextAttemptAt: null,
    });
  }

  return next(job, now, {
    status: 'FAILED',
    errorMessage: 'Job timed out: worker stopped responding and retries are exhausted',
    progressMessage: 'Failed',
    completedAt: now,
  });
}

export function finalizeParentJob(
  parent: GenerationJob,
  children: readonly GenerationJob[],
  policy: AggregationPolicy,
  now: Date
): GenerationJob | null {
  if (parent.status !== 'PROCESSING') return null;

  const decision = aggregateChildren(children, policy);
  const tokensUsed = children.reduce((sum, child) => sum + child.tokensUsed, 0);

  if (decision.kind === 'pending') {
    const percent = Math.max(parent.progressPercent, decision.percent);
    if (percent === parent.progressPercent && decision.message === parent.progressMessage && tokensUsed === parent.tokensUsed) {
      return null;
    }
    return next(parent, now, { progressPercent: percent, progressMessage: decision.message, tokensUsed });
  }

  const status: JobStatus = decision.kind === 'completed' ? 'COMPLETED' : 'FAILED';
  return next(parent, now, {
    status,
    progressPercent: status === 'COMPLETED' ? 100 : parent.progressPercent,
    progressMessage: decision.kind === 'completed' ? decision.message : 'Failed',
    errorMessage: decision.errorMessage,
    tokensUsed,
    completedAt: now,
  });
}
