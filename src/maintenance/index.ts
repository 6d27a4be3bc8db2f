import type { Logger } from '../logger.js';
import { aggregateChildren } from '../batch/aggregation.js';
import type { BatchCoordinator } from '../batch/coordinator.js';
import { errorMessage } from '../errors.js';
import type { NotificationFanout } from '../notifications/fanout.js';
import { PROVISION_TASK, type TaskQueue } from '../queue/base.js';
import type { JobStore } from '../repositories/base.js';
import type { RegistrationRepository } from '../registrations/repository.js';
import { isTerminal, isWorkJobType, type GenerationJob } from '../types/job.js';
import { PROVISION_TASK_MAX_RETRIES } from '../webhooks/checkout.js';

/** A paid registration this old without provisioning gets its task re-enqueued. */
export const REPROVISION_AFTER_MS = 5 * 60_000;
/** Page size when sweeping batch parents. */
const BATCH_SWEEP_PAGE = 100;
/** A registration stuck this long is reported for operators. */
export const STUCK_REGISTRATION_MS = 30 * 60_000;

export interface MaintenanceOptions {
  store: JobStore;
  queue: TaskQueue;
  registrations: RegistrationRepository;
  batch: BatchCoordinator;
  notifier: NotificationFanout;
  logger: Logger;
  intervalMs: number;
  staleJobTimeoutMs: number;
  now?: () => Date;
}

export interface MaintenanceReport {
  requeuedJobs: number;
  timedOutJobs: number;
  finalizedBatches: number;
  reprovisioned: number;
  stuckRegistrations: number;
  expiredRegistrations: number;
}

/**
 * Periodic housekeeping: the stale-job watchdog, re-aggregation of batch
 * parents whose last child finished without moving them, reconciliation of
 * paid but unprovisioned registrations, and cleanup of expired checkouts.
 * Each step runs even when an earlier one failed.
 */
export class Maintenance {
  private timer?: NodeJS.Timeout;
  private current?: Promise<MaintenanceReport>;
  private isRunning = false;
  private logger: Logger;
  private now: () => Date;

  constructor(private options: MaintenanceOptions) {
    this.logger = options.logger.child({ component: 'maintenance' });
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.scheduleNextRun();
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    if (this.current) {
      await this.current;
    }
  }

  async runOnce(): Promise<MaintenanceReport> {
    const report: MaintenanceReport = {
      requeuedJobs: 0,
      timedOutJobs: 0,
      finalizedBatches: 0,
      reprovisioned: 0,
      stuckRegistrations: 0,
      expiredRegistrations: 0,
    };
    await this.step('reclaim stale jobs', () => this.reclaimStaleJobs(report));
    await this.step('finalize batches', () => this.finalizeBatches(report));
    await this.step('reconcile registrations', () => this.reconcileRegistrations(report));
    await this.step('clean up registrations', async () => {
      report.expiredRegistrations = await this.options.registrations.deleteExpired(this.now());
    });

    if (Object.values(report).some((count) => count > 0)) {
      this.logger.info(report, 'Maintenance pass finished');
    }
    return report;
  }

  private scheduleNextRun(): void {
    if (!this.isRunning) return;

    this.timer = setTimeout(() => {
      this.current = this.runOnce();
      void this.current.finally(() => {
        this.current = undefined;
        this.scheduleNextRun();
      });
    }, this.options.intervalMs);
  }

  private async step(name: string, run: () => Promise<void>): Promise<void> {
    try {
      await run();
    } catch (error) {
      this.logger.error({ step: name, error: errorMessage(error) }, 'Maintenance step failed');
    }
  }

  private async reclaimStaleJobs(report: MaintenanceReport): Promise<void> {
    const now = this.now();
    const reclaimed = await this.options.store.reclaimStale({
      olderThan: new Date(now.getTime() - this.options.staleJobTimeoutMs),
      now,
    });

    for (const job of reclaimed) {
      const logger = this.logger.child({ jobId: job.id, tenantId: job.tenantId });
      if (job.status === 'QUEUED') {
        report.requeuedJobs++;
        logger.warn({ retryCount: job.retryCount }, 'Requeued job after worker timeout');
        await this.enqueue(job, logger);
      } else {
        report.timedOutJobs++;
        logger.error('Job timed out with no retries left');
        await this.afterTimeout(job, logger);
      }
    }
  }

  private async enqueue(job: GenerationJob, logger: Logger): Promise<void> {
    if (!isWorkJobType(job.type)) return;
    try {
      await this.options.queue.enqueue({ type: job.type, payload: { jobId: job.id } });
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to enqueue reclaimed job; sweep will pick it up');
    }
  }

  private async afterTimeout(job: GenerationJob, logger: Logger): Promise<void> {
    try {
      if (job.parentJobId !== null) {
        await this.options.batch.onChildTerminal(job.parentJobId);
      } else {
        await this.options.notifier.jobFinished(job);
      }
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to report timed-out job');
    }
  }

  private async finalizeBatches(report: MaintenanceReport): Promise<void> {
    const parents: GenerationJob[] = [];
    let cursor: string | undefined;
    do {
      const page = await this.options.store.find({
        type: 'FULL_COURSE',
        status: 'PROCESSING',
        cursor,
        limit: BATCH_SWEEP_PAGE,
      });
      parents.push(...page.jobs);
      cursor = page.nextCursor;
    } while (cursor);

    for (const parent of parents) {
      const logger = this.logger.child({ jobId: parent.id, tenantId: parent.tenantId });
      try {
        const children = await this.options.store.listChildren(parent.id);
        if (aggregateChildren(children, this.options.batch.policy).kind === 'pending') continue;

        const finalized = await this.options.batch.onChildTerminal(parent.id);
        if (isTerminal(finalized.status)) {
          report.finalizedBatches++;
          logger.warn({ status: finalized.status }, 'Finalized lesson batch left open after its children finished');
        }
      } catch (error) {
        logger.warn({ error: errorMessage(error) }, 'Failed to finalize lesson batch; next pass retries');
      }
    }
  }

  private async reconcileRegistrations(report: MaintenanceReport): Promise<void> {
    const now = this.now().getTime();

    for (const registration of await this.options.registrations.listByStatus('paid')) {
      const paidAt = (registration.paidAt ?? registration.updatedAt).getTime();
      const waitingMs = now - paidAt;
      const logger = this.logger.child({ checkoutSessionId: registration.checkoutSessionId });

      if (waitingMs > STUCK_REGISTRATION_MS) {
        report.stuckRegistrations++;
        logger.error({ waitingMinutes: Math.floor(waitingMs / 60_000) }, 'Paid registration still not provisioned');
      }
      if (waitingMs > REPROVISION_AFTER_MS) {
        await this.options.queue.enqueue(
          { type: PROVISION_TASK, payload: { checkoutSessionId: registration.checkoutSessionId } },
          { maxRetries: PROVISION_TASK_MAX_RETRIES }
        );
        report.reprovisioned++;
      }
    }

    for (const registration of await this.options.registrations.listByStatus('provisioning')) {
      if (now - registration.updatedAt.getTime() > STUCK_REGISTRATION_MS) {
        report.stuckRegistrations++;
        this.logger.error(
          { checkoutSessionId: registration.checkoutSessionId },
          'Registration stuck while provisioning'
        );
      }
    }
  }
}
