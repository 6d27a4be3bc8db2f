import type { Logger } from '../logger.js';
import type { BatchCoordinator } from '../batch/coordinator.js';
import { InvalidStateError, JobCancelledError, errorMessage, isRetryable } from '../errors.js';
import type { BackoffPolicy } from '../lib/backoff.js';
import type { NotificationFanout } from '../notifications/fanout.js';
import { runJobHandler, type JobHandlerRegistry } from '../orchestrator/index.js';
import type { StepContext } from '../orchestrator/workflow.js';
import { PROVISION_TASK, isJobTask, type Task, type TaskQueue, type TaskType } from '../queue/base.js';
import type { JobStore } from '../repositories/base.js';
import { WORK_JOB_TYPES, isWorkJobType, type GenerationJob, type WorkJobType } from '../types/job.js';

export interface WorkerConfig {
  concurrency: number;
  pollIntervalMs: number;
  visibilityTimeoutMs: number;
  /** Job types this pool executes; all of them by default. */
  capabilities?: readonly WorkJobType[];
}

export interface WorkerStats {
  running: number;
  processed: number;
  failed: number;
  retried: number;
  cancelled: number;
}

/** Handles a task that is not a job, such as account provisioning. */
export interface TaskHandler {
  handle(task: Task, logger: Logger): Promise<void>;
}

export type TaskHandlers = Partial<Record<typeof PROVISION_TASK, TaskHandler>>;

export interface WorkerPoolDeps {
  store: JobStore;
  queue: TaskQueue;
  handlers: JobHandlerRegistry;
  taskHandlers?: TaskHandlers;
  batch: BatchCoordinator;
  notifier: NotificationFanout;
  /** Delay before a failed plain task is redelivered. */
  taskBackoff: BackoffPolicy;
  logger: Logger;
  now?: () => Date;
}

/**
 * Fixed-size pool of worker slots. Each slot takes the next task from the
 * queue; when the queue is empty it sweeps the store for claimable jobs whose
 * task was lost. The Job Store's conditional claim is what guarantees a job
 * runs on one worker at a time; the queue only delivers hints.
 */
/** Writes of a running attempt are conditional on the claim it started under. */
function claimedAt(job: GenerationJob): Date | undefined {
  return job.startedAt ?? undefined;
}

export class WorkerPool {
  private isRunning = false;
  private timers = new Map<number, NodeJS.Timeout>();
  private inFlight = new Set<Promise<boolean>>();
  private runningJobs = new Map<string, AbortController>();
  private stats: Omit<WorkerStats, 'running'> = {
    processed: 0,
    failed: 0,
    retried: 0,
    cancelled: 0,
  };
  private capabilities: readonly WorkJobType[];
  private taskTypes: TaskType[];
  private logger: Logger;
  private now: () => Date;

  constructor(
    private deps: WorkerPoolDeps,
    private config: WorkerConfig
  ) {
    this.capabilities = config.capabilities ?? WORK_JOB_TYPES;
    this.taskTypes = [...this.capabilities];
    if (deps.taskHandlers?.[PROVISION_TASK]) {
      this.taskTypes.push(PROVISION_TASK);
    }
    this.logger = deps.logger.child({ component: 'worker' });
    this.now = deps.now ?? (() => new Date());
  }

  start(): void {
    if (this.isRunning) return;

    this.isRunning = true;
    for (let slot = 0; slot < this.config.concurrency; slot++) {
      this.scheduleNextPoll(slot, 0);
    }
    this.logger.info({ concurrency: this.config.concurrency, taskTypes: this.taskTypes }, 'Worker pool started');
  }

  /**
   * Stops taking work and waits up to `deadlineMs` for running jobs. Jobs
   * still running afterwards are aborted; they stop at their next checkpoint
   * and stay PROCESSING until the watchdog reclaims them.
   */
  async shutdown(deadlineMs: number): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();

    let deadline: NodeJS.Timeout | undefined;
    const expired = new Promise<'expired'>((resolve) => {
      deadline = setTimeout(() => resolve('expired'), deadlineMs);
    });
    const outcome = await Promise.race([Promise.allSettled([...this.inFlight]).then(() => 'drained' as const), expired]);
    clearTimeout(deadline);

    if (outcome === 'expired') {
      this.logger.warn({ running: this.runningJobs.size }, 'Shutdown deadline passed; aborting running jobs');
      for (const controller of this.runningJobs.values()) {
        controller.abort();
      }
    }
    this.logger.info({ ...this.getStats() }, 'Worker pool stopped');
  }

  getStats(): WorkerStats {
    return { running: this.runningJobs.size, ...this.stats };
  }

  /** Processes at most one task or swept job; resolves true when it did work. */
  async processNext(): Promise<boolean> {
    const task = await this.deps.queue.dequeue(this.taskTypes, {
      visibilityTimeoutMs: this.config.visibilityTimeoutMs,
    });
    if (task) {
      await this.processTask(task);
      return true;
    }

    const job = await this.deps.store.claimNext({ capabilities: this.capabilities, now: this.now() });
    if (!job) return false;

    await this.runJob(job);
    return true;
  }

  private scheduleNextPoll(slot: number, delayMs: number): void {
    if (!this.isRunning) return;

    const timer = setTimeout(() => {
      this.timers.delete(slot);
      const poll = this.processNext().catch((error: unknown) => {
        this.logger.error({ slot, error: errorMessage(error) }, 'Error in poll and execute');
        return false;
      });
      this.inFlight.add(poll);
      void poll.then((worked) => {
        this.inFlight.delete(poll);
        this.scheduleNextPoll(slot, worked ? 0 : this.config.pollIntervalMs);
      });
    }, delayMs);
    this.timers.set(slot, timer);
  }

  private async processTask(task: Task): Promise<void> {
    const logger = this.logger.child({ taskId: task.id, taskType: task.type, attempt: task.attempts });

    if (!isJobTask(task)) {
      await this.processPlainTask(task, logger);
      return;
    }

    const job = await this.deps.store.claim(task.payload.jobId, { now: this.now() });
    if (!job) {
      // Already claimed, finished, cancelled, or scheduled for a later attempt
      logger.debug({ jobId: task.payload.jobId }, 'Job not claimable; dropping task');
      await this.deps.queue.ack(task.id);
      return;
    }

    try {
      await this.runJob(job);
    } finally {
      await this.deps.queue.ack(task.id);
    }
  }

  private async processPlainTask(task: Task, logger: Logger): Promise<void> {
    const handler = task.type === PROVISION_TASK ? this.deps.taskHandlers?.[PROVISION_TASK] : undefined;
    if (!handler) {
      await this.deps.queue.nack(task.id, { delayMs: this.config.pollIntervalMs, error: `No handler for ${task.type}` });
      return;
    }

    try {
      await handler.handle(task, logger);
      await this.deps.queue.ack(task.id);
    } catch (error) {
      const delayMs = this.deps.taskBackoff(task.attempts);
      const result = await this.deps.queue.nack(task.id, { delayMs, error: errorMessage(error) });
      if (result === 'dead') {
        logger.error({ error: errorMessage(error) }, 'Task moved to dead letters');
      } else {
        logger.warn({ error: errorMessage(error), delayMs }, 'Task failed; redelivery scheduled');
      }
    }
  }

  private async runJob(job: GenerationJob): Promise<void> {
    const logger = this.logger.child({ jobId: job.id, tenantId: job.tenantId, type: job.type });
    const controller = new AbortController();
    this.runningJobs.set(job.id, controller);

    try {
      if (job.retryCount === 0) {
        await this.notify(logger, () => this.deps.notifier.jobMilestone(job, 'started'));
      }

      const context: StepContext = {
        job,
        signal: controller.signal,
        logger,
        checkpoint: (_step, percent, message) => this.checkpoint(job, controller.signal, percent, message),
      };
      const outcome = await runJobHandler(this.deps.handlers, context, job.input);

      const { job: completed, changed } = await this.deps.store.complete(job.id, outcome, this.now(), claimedAt(job));
      if (changed) {
        this.stats.processed++;
        logger.info({ tokensUsed: outcome.tokensUsed }, 'Job completed');
        await this.afterTerminal(completed, logger);
      } else {
        logger.warn({ status: completed.status }, 'Job result discarded; this attempt no longer holds the job');
      }
    } catch (error) {
      if (error instanceof JobCancelledError) {
        this.stats.cancelled++;
        logger.info({ reason: error.reason }, 'Job stopped');
        return;
      }
      await this.handleFailure(job, error, logger);
    } finally {
      this.runningJobs.delete(job.id);
    }
  }

  private async checkpoint(job: GenerationJob, signal: AbortSignal, percent: number, message: string): Promise<void> {
    if (signal.aborted) {
      throw new JobCancelledError(job.id, 'shutdown');
    }
    try {
      await this.deps.store.updateProgress(job.id, percent, message, this.now(), claimedAt(job));
    } catch (error) {
      // No longer ours: cancelled, or reclaimed by the watchdog and claimed again
      if (error instanceof InvalidStateError) {
        throw new JobCancelledError(job.id, 'cancelled');
      }
      throw error;
    }
  }

  private async handleFailure(job: GenerationJob, error: unknown, logger: Logger): Promise<void> {
    const retryable = isRetryable(error);
    const now = this.now();
    const { job: failed, changed } = await this.deps.store.fail(job.id, {
      message: errorMessage(error),
      retryable,
      now,
      claimedAt: claimedAt(job),
    });
    if (!changed) return;

    if (failed.status === 'QUEUED') {
      this.stats.retried++;
      const delayMs = failed.nextAttemptAt ? Math.max(0, failed.nextAttemptAt.getTime() - now.getTime()) : 0;
      logger.warn({ error: errorMessage(error), retryCount: failed.retryCount, delayMs }, 'Job failed; retry scheduled');
      await this.requeue(failed, delayMs, logger);
      return;
    }

    this.stats.failed++;
    logger.error({ error: errorMessage(error), retryable }, 'Job failed');
    await this.afterTerminal(failed, logger);
  }

  private async requeue(job: GenerationJob, delayMs: number, logger: Logger): Promise<void> {
    if (!isWorkJobType(job.type)) return;
    try {
      await this.deps.queue.enqueue({ type: job.type, payload: { jobId: job.id } }, { delayMs });
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to enqueue retry; sweep will pick the job up');
    }
  }

  private async afterTerminal(job: GenerationJob, logger: Logger): Promise<void> {
    const parentJobId = job.parentJobId;
    if (parentJobId !== null) {
      await this.notify(logger, () => this.deps.batch.onChildTerminal(parentJobId));
    } else {
      await this.notify(logger, () => this.deps.notifier.jobFinished(job));
    }
  }

  private async notify(logger: Logger, send: () => Promise<unknown>): Promise<void> {
    try {
      await send();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Post-transition notification failed');
    }
  }
}
