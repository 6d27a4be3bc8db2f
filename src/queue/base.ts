import { z } from 'zod';
import { WORK_JOB_TYPES, type WorkJobType } from '../types/job.js';

export const PROVISION_TASK = 'registration:provision';

export type TaskType = WorkJobType | typeof PROVISION_TASK;

/** A task carries only a reference; the Job Store owns job state. */
export type TaskMessage =
  | { type: WorkJobType; payload: { jobId: string } }
  | { type: typeof PROVISION_TASK; payload: { checkoutSessionId: string } };

export interface TaskMeta {
  id: string;
  /** Deliveries so far, including the current one. */
  attempts: number;
  /** Redeliveries allowed after the first delivery before dead-lettering. */
  maxRetries: number;
  visibleAt: Date;
  enqueuedAt: Date;
  lastError: string | null;
}

export type Task = TaskMessage & TaskMeta;

export interface EnqueueOptions {
  delayMs?: number;
  maxRetries?: number;
}

export type NackResult = 'requeued' | 'dead';

export interface QueueDepth {
  ready: number;
  inFlight: number;
  dead: number;
}

export interface TaskQueue {
  enqueue(message: TaskMessage, options?: EnqueueOptions): Promise<Task>;

  /** Next visible task of one of `types`, hidden from other consumers for `visibilityTimeoutMs`. */
  dequeue(types: readonly TaskType[], options: { visibilityTimeoutMs: number }): Promise<Task | null>;

  ack(taskId: string): Promise<void>;

  /** Returns the task for redelivery after `delayMs`, or dead-letters it once its budget is spent. */
  nack(taskId: string, options: { delayMs: number; error: string }): Promise<NackResult>;

  listDeadLetters(limit?: number): Promise<Task[]>;
  requeueDeadLetter(taskId: string): Promise<Task | null>;
  depth(): Promise<QueueDepth>;
}

export const DEFAULT_TASK_MAX_RETRIES = 3;

export function isJobTask(task: Task): task is Extract<Task, { payload: { jobId: string } }> {
  return task.type !== PROVISION_TASK;
}

const JobTaskMessageSchema = z.object({
  type: z.enum(WORK_JOB_TYPES),
  payload: z.object({ jobId: z.string() }),
});

const ProvisionTaskMessageSchema = z.object({
  type: z.literal(PROVISION_TASK),
  payload: z.object({ checkoutSessionId: z.string() }),
});

const TaskMetaSchema = z.object({
  id: z.string(),
  attempts: z.number(),
  maxRetries: z.number(),
  visibleAt: z.coerce.date(),
  enqueuedAt: z.coerce.date(),
  lastError: z.string().nullable(),
});

export const TaskSchema = z.union([
  JobTaskMessageSchema.merge(TaskMetaSchema),
  ProvisionTaskMessageSchema.merge(TaskMetaSchema),
]);
