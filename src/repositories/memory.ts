import { monotonicFactory } from 'ulid';
import { NotFoundError, ValidationError } from '../errors.js';
import { noBackoff, type BackoffPolicy } from '../lib/backoff.js';
import type { AggregationPolicy } from '../batch/aggregation.js';
import type {
  CreateJobData,
  GenerationJob,
  GenerationJobType,
  JobOutcome,
  JobQuery,
  JobStats,
  TransitionResult,
} from '../types/job.js';
import type { JobStore } from './base.js';
import {
  newJob,
  isClaimable,
  claimJob,
  progressJob,
  completeJob,
  failJob,
  cancelJob,
  retryJob,
  isStale,
  reclaimJob,
  finalizeParentJob,
  type FailOptions,
} from './transitions.js';

function byCreation(a: GenerationJob, b: GenerationJob): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}

/**
 * Single-process store. Every transition reads and writes without awaiting in
 * between, so each one is atomic with respect to other callers.
 */
export class InMemoryJobStore implements JobStore {
  private jobs = new Map<string, GenerationJob>();
  private nextId = monotonicFactory();
  private backoff: BackoffPolicy;

  constructor(options: { backoff?: BackoffPolicy } = {}) {
    this.backoff = options.backoff ?? noBackoff;
  }

  async create(data: CreateJobData): Promise<GenerationJob> {
    const job = newJob(data, { id: this.nextId(), now: new Date() });
    if (job.type === 'FULL_COURSE') {
      throw new ValidationError('FULL_COURSE jobs are created through a lesson fan-out');
    }
    this.jobs.set(job.id, job);
    return job;
  }

  async createBatch(parentData: CreateJobData, childData: CreateJobData[]): Promise<{ parent: GenerationJob; children: GenerationJob[] }> {
    if (childData.length === 0) {
      throw new ValidationError('A batch needs at least one lesson');
    }
    const now = new Date();
    const parent = newJob({ ...parentData, maxRetries: 0 }, {
      id: this.nextId(),
      now,
      status: 'PROCESSING',
      progressMessage: `Generating ${childData.length} lessons...`,
    });
    if (parent.type !== 'FULL_COURSE') {
      throw new ValidationError('Batch parent must be a FULL_COURSE job');
    }
    const children = childData.map((data) => newJob(data, { id: this.nextId(), now, parentJobId: parent.id }));
    if (children.some((child) => child.type !== 'LESSON_CONTENT')) {
      throw new ValidationError('Batch children must be LESSON_CONTENT jobs');
    }

    this.jobs.set(parent.id, parent);
    for (const child of children) {
      this.jobs.set(child.id, child);
    }
    return { parent, children };
  }

  async get(id: string): Promise<GenerationJob | null> {
    return this.jobs.get(id) ?? null;
  }

  async find(query: JobQuery): Promise<{ jobs: GenerationJob[]; nextCursor?: string }> {
    let jobs = Array.from(this.jobs.values());

    if (query.tenantId) {
      jobs = jobs.filter(job => job.tenantId === query.tenantId);
    }
    if (query.type) {
      jobs = jobs.filter(job => job.type === query.type);
    }
    if (query.status) {
      jobs = jobs.filter(job => job.status === query.status);
    }
    if (query.courseId) {
      jobs = jobs.filter(job => job.courseId === query.courseId);
    }
    if (query.parentJobId) {
      jobs = jobs.filter(job => job.parentJobId === query.parentJobId);
    }

    // Newest first
    jobs.sort((a, b) => byCreation(b, a));

    if (query.cursor) {
      const cursorIndex = jobs.findIndex(job => job.id === query.cursor);
      if (cursorIndex >= 0) {
        jobs = jobs.slice(cursorIndex + 1);
      }
    }

    const limit = query.limit ?? 50;
    const hasMore = jobs.length > limit;
    if (hasMore) {
      jobs = jobs.slice(0, limit);
    }

    return {
      jobs,
      nextCursor: hasMore ? jobs[jobs.length - 1]?.id : undefined,
    };
  }

  async listChildren(parentJobId: string): Promise<GenerationJob[]> {
    return Array.from(this.jobs.values())
      .filter(job => job.parentJobId === parentJobId)
      .sort(byCreation);
  }

  async claim(id: string, options: { now: Date }): Promise<GenerationJob | null> {
    const job = this.jobs.get(id);
    if (!job) return null;
    const claimed = claimJob(job, options.now);
    if (claimed) this.jobs.set(id, claimed);
    return claimed;
  }

  async claimNext(options: { capabilities: readonly GenerationJobType[]; now: Date }): Promise<GenerationJob | null> {
    const candidate = Array.from(this.jobs.values())
      .filter(job => isClaimable(job, options.now, options.capabilities))
      .sort(byCreation)[0];
    if (!candidate) return null;

    const claimed = claimJob(candidate, options.now);
    if (claimed) this.jobs.set(claimed.id, claimed);
    return claimed;
  }

  async updateProgress(id: string, percent: number, message: string, now: Date = new Date(), claimedAt?: Date): Promise<GenerationJob> {
    const updated = progressJob(this.require(id), percent, message, now, claimedAt);
    this.jobs.set(id, updated);
    return updated;
  }

  async complete(id: string, outcome: JobOutcome, now: Date = new Date(), claimedAt?: Date): Promise<TransitionResult> {
    return this.apply(id, (job) => completeJob(job, outcome, now, claimedAt));
  }

  async fail(id: string, options: FailOptions): Promise<TransitionResult> {
    return this.apply(id, (job) => failJob(job, options, this.backoff));
  }

  async cancel(id: string, now: Date = new Date()): Promise<TransitionResult> {
    return this.apply(id, (job) => cancelJob(job, now));
  }

  async cancelChildren(parentJobId: string, now: Date = new Date()): Promise<GenerationJob[]> {
    const cancelled: GenerationJob[] = [];
    for (const child of await this.listChildren(parentJobId)) {
      const result = await this.cancel(child.id, now);
      if (result.changed) cancelled.push(result.job);
    }
    return cancelled;
  }

  async retry(id: string, now: Date = new Date()): Promise<GenerationJob> {
    const updated = retryJob(this.require(id), now);
    this.jobs.set(id, updated);
    return updated;
  }

  async reclaimStale(options: { olderThan: Date; now: Date }): Promise<GenerationJob[]> {
    const reclaimed: GenerationJob[] = [];
    for (const job of this.jobs.values()) {
      if (!isStale(job, options.olderThan)) continue;
      const updated = reclaimJob(job, options.now);
      if (updated) {
        this.jobs.set(job.id, updated);
        reclaimed.push(updated);
      }
    }
    return reclaimed;
  }

  async finalizeParent(parentJobId: string, options: { policy: AggregationPolicy; now: Date }): Promise<TransitionResult> {
    const children = Array.from(this.jobs.values()).filter(job => job.parentJobId === parentJobId);
    return this.apply(parentJobId, (parent) => finalizeParentJob(parent, children, options.policy, options.now));
  }

  async getStats(): Promise<JobStats> {
    const stats: JobStats = { queued: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 };
    for (const job of this.jobs.values()) {
      switch (job.status) {
        case 'QUEUED': stats.queued++; break;
        case 'PROCESSING': stats.processing++; break;
        case 'COMPLETED': stats.completed++; break;
        case 'FAILED': stats.failed++; break;
        case 'CANCELLED': stats.cancelled++; break;
      }
    }
    return stats;
  }

  private require(id: string): GenerationJob {
    const job = this.jobs.get(id);
    if (!job) throw new NotFoundError('Job', id);
    return job;
  }

  private apply(id: string, transition: (job: GenerationJob) => GenerationJob | null): TransitionResult {
    const job = this.require(id);
    const updated = transition(job);
    if (!updated) return { job, changed: false };
    this.jobs.set(id, updated);
    return { job: updated, changed: true };
  }
}
