import { monotonicFactory } from 'ulid';
import { z } from 'zod';
import { ConcurrencyConflict, NotFoundError, ValidationError } from '../errors.js';
import { noBackoff, type BackoffPolicy } from '../lib/backoff.js';
import { keySegment } from '../lib/keys.js';
import type { UpstashClient } from '../lib/upstash.js';
import { JobInputSchema, JobStatusSchema, JobTypeSchema } from '../schemas/job.js';
import type { AggregationPolicy } from '../batch/aggregation.js';
import {
  JOB_STATUSES,
  type CreateJobData,
  type GenerationJob,
  type GenerationJobType,
  type JobOutcome,
  type JobQuery,
  type JobStats,
  type JobStatus,
  type TransitionResult,
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

const StoredJobSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  type: JobTypeSchema,
  status: JobStatusSchema,
  progressPercent: z.number(),
  progressMessage: z.string(),
  resultPath: z.string().nullable(),
  errorMessage: z.string().nullable(),
  tokensUsed: z.number(),
  retryCount: z.number(),
  maxRetries: z.number(),
  parentJobId: z.string().nullable(),
  courseId: z.string().nullable(),
  lessonId: z.string().nullable(),
  smeTaskId: z.string().nullable(),
  submissionId: z.string().nullable(),
  input: JobInputSchema,
  createdByUserId: z.string(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  startedAt: z.coerce.date().nullable(),
  completedAt: z.coerce.date().nullable(),
  nextAttemptAt: z.coerce.date().nullable(),
  version: z.number(),
});

// KEYS: job key, current status index, next status index
// ARGV: expected version, serialized job, job id, index score
const COMPARE_AND_SET = `
local current = redis.call('GET', KEYS[1])
if not current then return -1 end
local job = cjson.decode(current)
if tonumber(job.version) ~= tonumber(ARGV[1]) then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('ZREM', KEYS[2], ARGV[3])
redis.call('ZADD', KEYS[3], ARGV[4], ARGV[3])
return 1
`;

// ARGV: key prefix, job count, then per job: id, serialized job, status, score, encoded tenant id, parent id
const INSERT_JOBS = `
local prefix = ARGV[1]
local count = tonumber(ARGV[2])
for i = 0, count - 1 do
  local base = 3 + i * 6
  local id = ARGV[base]
  redis.call('SET', prefix .. 'job:' .. id, ARGV[base + 1])
  redis.call('ZADD', prefix .. 'jobs:status:' .. ARGV[base + 2], ARGV[base + 3], id)
  redis.call('ZADD', prefix .. 'jobs:tenant:' .. ARGV[base + 4], ARGV[base + 3], id)
  if ARGV[base + 5] ~= '' then
    redis.call('SADD', prefix .. 'jobs:children:' .. ARGV[base + 5], id)
  end
end
return count
`;

const MAX_CAS_ATTEMPTS = 5;
const CLAIM_SCAN_SIZE = 100;

type Transition = (job: GenerationJob) => GenerationJob | null | Promise<GenerationJob | null>;

/**
 * JobStore on Redis (Upstash REST). Jobs are JSON documents indexed by status,
 * tenant and parent. Every transition is an optimistic compare-and-set on the
 * job's version, executed as one Lua script.
 */
export class RedisJobStore implements JobStore {
  private nextId = monotonicFactory();
  private backoff: BackoffPolicy;
  private prefix: string;

  constructor(private client: UpstashClient, options: { backoff?: BackoffPolicy; prefix?: string } = {}) {
    this.backoff = options.backoff ?? noBackoff;
    this.prefix = options.prefix ?? '';
  }

  private jobKey(id: string): string {
    return `${this.prefix}job:${id}`;
  }

  private statusKey(status: JobStatus): string {
    return `${this.prefix}jobs:status:${status}`;
  }

  private tenantKey(tenantId: string): string {
    return `${this.prefix}jobs:tenant:${keySegment(tenantId)}`;
  }

  private childrenKey(parentJobId: string): string {
    return `${this.prefix}jobs:children:${parentJobId}`;
  }

  private serializeJob(job: GenerationJob): string {
    return JSON.stringify({
      ...job,
      createdAt: job.createdAt.toISOString(),
      updatedAt: job.updatedAt.toISOString(),
      startedAt: job.startedAt?.toISOString() ?? null,
      completedAt: job.completedAt?.toISOString() ?? null,
      nextAttemptAt: job.nextAttemptAt?.toISOString() ?? null,
    });
  }

  private deserializeJob(data: string): GenerationJob {
    return StoredJobSchema.parse(JSON.parse(data));
  }

  private async insert(jobs: GenerationJob[]): Promise<void> {
    const args: (string | number)[] = [this.prefix, jobs.length];
    for (const job of jobs) {
      args.push(job.id, this.serializeJob(job), job.status, job.createdAt.getTime(), keySegment(job.tenantId), job.parentJobId ?? '');
    }
    await this.client.eval(INSERT_JOBS, [], args);
  }

  async create(data: CreateJobData): Promise<GenerationJob> {
    const job = newJob(data, { id: this.nextId(), now: new Date() });
    if (job.type === 'FULL_COURSE') {
      throw new ValidationError('FULL_COURSE jobs are created through a lesson fan-out');
    }
    await this.insert([job]);
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

    await this.insert([parent, ...children]);
    return { parent, children };
  }

  async get(id: string): Promise<GenerationJob | null> {
    const data = await this.client.string(['GET', this.jobKey(id)]);
    return data ? this.deserializeJob(data) : null;
  }

  private async getMany(ids: string[]): Promise<GenerationJob[]> {
    if (ids.length === 0) return [];
    const data = await this.client.nullableStrings(['MGET', ...ids.map((id) => this.jobKey(id))]);
    return data
      .filter((item): item is string => item !== null)
      .map((item) => this.deserializeJob(item));
  }

  async find(query: JobQuery): Promise<{ jobs: GenerationJob[]; nextCursor?: string }> {
    let ids: string[];
    if (query.parentJobId) {
      ids = await this.client.strings(['SMEMBERS', this.childrenKey(query.parentJobId)]);
    } else if (query.tenantId) {
      ids = await this.client.strings(['ZREVRANGE', this.tenantKey(query.tenantId), 0, -1]);
    } else if (query.status) {
      ids = await this.client.strings(['ZREVRANGE', this.statusKey(query.status), 0, -1]);
    } else {
      const perStatus = await Promise.all(
        JOB_STATUSES.map((status) => this.client.strings(['ZRANGE', this.statusKey(status), 0, -1]))
      );
      ids = perStatus.flat();
    }

    let jobs = await this.getMany(ids);

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

    // Newest first; ULIDs from one monotonic factory sort by creation
    jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime() || (b.id < a.id ? -1 : b.id > a.id ? 1 : 0));

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
    const ids = await this.client.strings(['SMEMBERS', this.childrenKey(parentJobId)]);
    const children = await this.getMany(ids);
    return children.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || (a.id < b.id ? -1 : 1));
  }

  /**
   * Reads the job, computes the next state, and writes it only if nobody else
   * wrote in between. A lost race re-reads and re-evaluates the transition.
   */
  private async mutate(id: string, transition: Transition): Promise<TransitionResult> {
    for (let attempt = 0; attempt < MAX_CAS_ATTEMPTS; attempt++) {
      const job = await this.get(id);
      if (!job) throw new NotFoundError('Job', id);

      const updated = await transition(job);
      if (!updated) return { job, changed: false };

      const result = await this.client.eval(
        COMPARE_AND_SET,
        [this.jobKey(id), this.statusKey(job.status), this.statusKey(updated.status)],
        [job.version, this.serializeJob(updated), id, updated.createdAt.getTime()]
      );
      if (result === 1) return { job: updated, changed: true };
      if (result === -1) throw new NotFoundError('Job', id);
    }
    throw new ConcurrencyConflict('Job', id);
  }

  async claim(id: string, options: { now: Date }): Promise<GenerationJob | null> {
    const job = await this.get(id);
    if (!job) return null;
    const result = await this.mutate(id, (current) => claimJob(current, options.now));
    return result.changed ? result.job : null;
  }

  async claimNext(options: { capabilities: readonly GenerationJobType[]; now: Date }): Promise<GenerationJob | null> {
    // Oldest first, a page at a time; jobs in backoff or of other types are skipped
    for (let offset = 0; ; offset += CLAIM_SCAN_SIZE) {
      const ids = await this.client.strings(['ZRANGE', this.statusKey('QUEUED'), offset, offset + CLAIM_SCAN_SIZE - 1]);
      const candidates = (await this.getMany(ids)).filter((job) => isClaimable(job, options.now, options.capabilities));

      for (const candidate of candidates) {
        const result = await this.mutate(candidate.id, (current) => claimJob(current, options.now));
        if (result.changed) return result.job;
      }
      if (ids.length < CLAIM_SCAN_SIZE) return null;
    }
  }

  async updateProgress(id: string, percent: number, message: string, now: Date = new Date(), claimedAt?: Date): Promise<GenerationJob> {
    const result = await this.mutate(id, (job) => progressJob(job, percent, message, now, claimedAt));
    return result.job;
  }

  async complete(id: string, outcome: JobOutcome, now: Date = new Date(), claimedAt?: Date): Promise<TransitionResult> {
    return this.mutate(id, (job) => completeJob(job, outcome, now, claimedAt));
  }

  async fail(id: string, options: FailOptions): Promise<TransitionResult> {
    return this.mutate(id, (job) => failJob(job, options, this.backoff));
  }

  async cancel(id: string, now: Date = new Date()): Promise<TransitionResult> {
    return this.mutate(id, (job) => cancelJob(job, now));
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
    const result = await this.mutate(id, (job) => retryJob(job, now));
    return result.job;
  }

  async reclaimStale(options: { olderThan: Date; now: Date }): Promise<GenerationJob[]> {
    const ids = await this.client.strings(['ZRANGE', this.statusKey('PROCESSING'), 0, -1]);
    const stale = (await this.getMany(ids)).filter((job) => isStale(job, options.olderThan));

    const reclaimed: GenerationJob[] = [];
    for (const job of stale) {
      const result = await this.mutate(job.id, (current) =>
        isStale(current, options.olderThan) ? reclaimJob(current, options.now) : null
      );
      if (result.changed) reclaimed.push(result.job);
    }
    return reclaimed;
  }

  async finalizeParent(parentJobId: string, options: { policy: AggregationPolicy; now: Date }): Promise<TransitionResult> {
    return this.mutate(parentJobId, async (parent) =>
      finalizeParentJob(parent, await this.listChildren(parentJobId), options.policy, options.now)
    );
  }

  async getStats(): Promise<JobStats> {
    const [queued, processing, completed, failed, cancelled] = await Promise.all(
      JOB_STATUSES.map((status) => this.client.number(['ZCARD', this.statusKey(status)]))
    );
    return {
      queued: queued ?? 0,
      processing: processing ?? 0,
      completed: completed ?? 0,
      failed: failed ?? 0,
      cancelled: cancelled ?? 0,
    };
  }
}
