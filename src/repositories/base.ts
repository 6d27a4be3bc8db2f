import type { AggregationPolicy } from '../batch/aggregation.js';
import type { FailOptions } from './transitions.js';
import type {
  CreateJobData,
  GenerationJob,
  GenerationJobType,
  JobOutcome,
  JobQuery,
  JobStats,
  TransitionResult,
} from '../types/job.js';

export interface JobStore {
  /** Creates a QUEUED job; throws ValidationError for bad input. */
  create(data: CreateJobData): Promise<GenerationJob>;

  /**
   * Creates a FULL_COURSE parent (PROCESSING, no retries) and its LESSON_CONTENT
   * children in one step. Children can only be created here, so a child never
   * has children of its own. A batch without children is a ValidationError.
   */
  createBatch(parent: CreateJobData, children: CreateJobData[]): Promise<{ parent: GenerationJob; children: GenerationJob[] }>;

  get(id: string): Promise<GenerationJob | null>;
  find(query: JobQuery): Promise<{ jobs: GenerationJob[]; nextCursor?: string }>;
  listChildren(parentJobId: string): Promise<GenerationJob[]>;

  /** Conditional QUEUED -> PROCESSING of one job; null if someone else got it first. */
  claim(id: string, options: { now: Date }): Promise<GenerationJob | null>;

  /** Claims the oldest eligible QUEUED job among `capabilities`; null when none is available. */
  claimNext(options: { capabilities: readonly GenerationJobType[]; now: Date }): Promise<GenerationJob | null>;

  /**
   * Only valid while PROCESSING; the stored percent never decreases. With
   * `claimedAt`, also only while the attempt that claimed the job at that time
   * still holds it. The same applies to `complete` and `fail`.
   */
  updateProgress(id: string, percent: number, message: string, now?: Date, claimedAt?: Date): Promise<GenerationJob>;

  complete(id: string, outcome: JobOutcome, now?: Date, claimedAt?: Date): Promise<TransitionResult>;

  /** Requeues with backoff while retries remain and the error is retryable; otherwise FAILED. */
  fail(id: string, options: FailOptions): Promise<TransitionResult>;

  /** QUEUED/PROCESSING -> CANCELLED; no-op on terminal jobs. */
  cancel(id: string, now?: Date): Promise<TransitionResult>;

  /** Cancels every non-terminal child of a parent; returns the ones it changed. */
  cancelChildren(parentJobId: string, now?: Date): Promise<GenerationJob[]>;

  /** Manual retry: FAILED -> QUEUED with the retry budget reset. */
  retry(id: string, now?: Date): Promise<GenerationJob>;

  /** Requeues (or fails, when out of retries) PROCESSING jobs started before `olderThan`. */
  reclaimStale(options: { olderThan: Date; now: Date }): Promise<GenerationJob[]>;

  /** Conditional check-and-set of a parent from its children's states. */
  finalizeParent(parentJobId: string, options: { policy: AggregationPolicy; now: Date }): Promise<TransitionResult>;

  getStats(): Promise<JobStats>;
}
