import type { z } from 'zod';
import type { JobInputSchema } from '../schemas/job.js';

export const JOB_TYPES = ['SME_INGESTION', 'COURSE_OUTLINE', 'LESSON_CONTENT', 'COMPONENT_REGEN', 'FULL_COURSE'] as const;
export const JOB_STATUSES = ['QUEUED', 'PROCESSING', 'COMPLETED', 'FAILED', 'CANCELLED'] as const;

export type GenerationJobType = typeof JOB_TYPES[number];
export type JobStatus = typeof JOB_STATUSES[number];

/** Job types a worker executes; FULL_COURSE parents do no work of their own. */
export type WorkJobType = Exclude<GenerationJobType, 'FULL_COURSE'>;
export const WORK_JOB_TYPES = ['SME_INGESTION', 'COURSE_OUTLINE', 'LESSON_CONTENT', 'COMPONENT_REGEN'] as const satisfies readonly WorkJobType[];

export type JobInput = z.infer<typeof JobInputSchema>;
export type JobInputOf<T extends GenerationJobType> = Extract<JobInput, { type: T }>;

export interface GenerationJob {
  id: string; // ULID
  tenantId: string;
  type: GenerationJobType;
  status: JobStatus;
  progressPercent: number; // 0..100
  progressMessage: string;
  resultPath: string | null;
  errorMessage: string | null;
  tokensUsed: number;
  retryCount: number;
  maxRetries: number;
  parentJobId: string | null;
  courseId: string | null;
  lessonId: string | null;
  smeTaskId: string | null;
  submissionId: string | null;
  input: JobInput;
  createdByUserId: string;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  /** Earliest time a requeued job may be claimed again. */
  nextAttemptAt: Date | null;
  /** Bumped on every write; conditional updates compare against it. */
  version: number;
}

export interface CreateJobData {
  tenantId: string;
  createdByUserId: string;
  input: JobInput;
  maxRetries?: number;
}

export interface JobQuery {
  tenantId?: string;
  type?: GenerationJobType;
  status?: JobStatus;
  courseId?: string;
  parentJobId?: string;
  cursor?: string;
  limit?: number;
}

export interface JobStats {
  queued: number;
  processing: number;
  completed: number;
  failed: number;
  cancelled: number;
}

/** Result of a conditional transition; `changed` is false for a no-op. */
export interface TransitionResult {
  job: GenerationJob;
  changed: boolean;
}

export interface JobOutcome {
  resultPath: string | null;
  tokensUsed: number;
}

export const TERMINAL_STATUSES: readonly JobStatus[] = ['COMPLETED', 'FAILED', 'CANCELLED'];

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function isWorkJobType(type: GenerationJobType): type is WorkJobType {
  return type !== 'FULL_COURSE';
}

export interface GenerationJobWire {
  id: string;
  tenantId: string;
  type: GenerationJobType;
  status: JobStatus;
  progressPercent: number;
  progressMessage: string;
  resultPath?: string;
  errorMessage?: string;
  tokensUsed: number;
  retryCount: number;
  maxRetries: number;
  parentJobId?: string;
  courseId?: string;
  lessonId?: string;
  smeTaskId?: string;
  submissionId?: string;
  createdByUserId: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
}

export function toWire(job: GenerationJob): GenerationJobWire {
  return {
    id: job.id,
    tenantId: job.tenantId,
    type: job.type,
    status: job.status,
    progressPercent: job.progressPercent,
    progressMessage: job.progressMessage,
    ...(job.resultPath !== null && { resultPath: job.resultPath }),
    ...(job.errorMessage !== null && { errorMessage: job.errorMessage }),
    tokensUsed: job.tokensUsed,
    retryCount: job.retryCount,
    maxRetries: job.maxRetries,
    ...(job.parentJobId !== null && { parentJobId: job.parentJobId }),
    ...(job.courseId !== null && { courseId: job.courseId }),
    ...(job.lessonId !== null && { lessonId: job.lessonId }),
    ...(job.smeTaskId !== null && { smeTaskId: job.smeTaskId }),
    ...(job.submissionId !== null && { submissionId: job.submissionId }),
    createdByUserId: job.createdByUserId,
    createdAt: job.createdAt.toISOString(),
    ...(job.startedAt !== null && { startedAt: job.startedAt.toISOString() }),
    ...(job.completedAt !== null && { completedAt: job.completedAt.toISOString() }),
  };
}

/** Who is acting: every presentation-facing call is scoped to one tenant. */
export interface TenantContext {
  tenantId: string;
  userId: string;
}
