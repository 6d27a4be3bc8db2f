import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryJobStore } from './memory.js';
import { InvalidStateError, NotFoundError, ValidationError } from '../errors.js';
import { toWire, type JobStatus } from '../types/job.js';
import { TENANT, OTHER_TENANT, USER, jobData, lessonInput, outlineInput, batchData, minutesAgo, nth } from '../testing/fixtures.js';

describe('InMemoryJobStore', () => {
  let store: InMemoryJobStore;

  beforeEach(() => {
    store = new InMemoryJobStore();
  });

  describe('create', () => {
    it('should create a job QUEUED with zero progress and default retries', async () => {
      const job = await store.create(jobData());

      expect(job.id).toBeDefined();
      expect(job.tenantId).toBe(TENANT);
      expect(job.type).toBe('COURSE_OUTLINE');
      expect(job.status).toBe('QUEUED');
      expect(job.progressPercent).toBe(0);
      expect(job.retryCount).toBe(0);
      expect(job.maxRetries).toBe(3);
      expect(job.courseId).toBe('course-1');
      expect(job.lessonId).toBeNull();
      expect(job.createdByUserId).toBe(USER);
    });

    it('should reject a job whose correlation reference is missing', async () => {
      await expect(store.create(jobData({ input: lessonInput('') }))).rejects.toThrow(
        'Missing correlation reference: lessonId'
      );
      expect((await store.getStats()).queued).toBe(0);
    });

    it('should reject FULL_COURSE jobs outside a batch', async () => {
      await expect(
        store.create(jobData({ input: { type: 'FULL_COURSE', courseId: 'course-1', lessonCount: 2 } }))
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should populate SME correlation references', async () => {
      const job = await store.create(jobData({
        input: { type: 'SME_INGESTION', smeTaskId: 'task-1', smeId: 'sme-1', submissionId: 'sub-1', documentPaths: ['a.txt'] },
      }));

      expect(job.smeTaskId).toBe('task-1');
      expect(job.submissionId).toBe('sub-1');
      expect(job.courseId).toBeNull();
    });
  });

  describe('wire shape', () => {
    it('should omit internal fields and unset optionals', async () => {
      const job = await store.create(jobData());
      const wire = toWire(job);

      expect(Object.keys(wire).sort()).toEqual([
        'courseId',
        'createdAt',
        'createdByUserId',
        'id',
        'maxRetries',
        'progressMessage',
        'progressPercent',
        'retryCount',
        'status',
        'tenantId',
        'tokensUsed',
        'type',
      ]);
      expect(wire.createdAt).toBe(job.createdAt.toISOString());
    });
  });

  describe('claimNext', () => {
    it('should claim the oldest eligible job', async () => {
      const first = await store.create(jobData({ input: outlineInput('course-1') }));
      await store.create(jobData({ input: outlineInput('course-2') }));

      const claimed = await store.claimNext({ capabilities: ['COURSE_OUTLINE'], now: new Date() });

      expect(claimed?.id).toBe(first.id);
      expect(claimed?.status).toBe('PROCESSING');
      expect(claimed?.startedAt).toBeInstanceOf(Date);
    });

    it('should only claim types within the capabilities', async () => {
      await store.create(jobData({ input: outlineInput() }));

      const claimed = await store.claimNext({ capabilities: ['LESSON_CONTENT'], now: new Date() });

      expect(claimed).toBeNull();
    });

    it('should never hand the same job to two concurrent claimers', async () => {
      const job = await store.create(jobData());

      const results = await Promise.all([
        store.claimNext({ capabilities: ['COURSE_OUTLINE'], now: new Date() }),
        store.claimNext({ capabilities: ['COURSE_OUTLINE'], now: new Date() }),
      ]);

      const claimedIds = results.filter((result) => result !== null).map((result) => result?.id);
      expect(claimedIds).toEqual([job.id]);
    });

    it('should skip jobs scheduled for a later retry', async () => {
      const now = new Date();
      const backoffStore = new InMemoryJobStore({ backoff: () => 60_000 });
      const job = await backoffStore.create(jobData());
      await backoffStore.claim(job.id, { now });
      await backoffStore.fail(job.id, { message: 'rate limited', retryable: true, now });

      expect(await backoffStore.claimNext({ capabilities: ['COURSE_OUTLINE'], now })).toBeNull();

      const later = new Date(now.getTime() + 60_000);
      expect((await backoffStore.claimNext({ capabilities: ['COURSE_OUTLINE'], now: later }))?.id).toBe(job.id);
    });

    it('should never claim batch parents', async () => {
      const { parent, children } = batchData(1);
      await store.createBatch(parent, children);

      const claimed = await store.claimNext({ capabilities: ['FULL_COURSE', 'LESSON_CONTENT'], now: new Date() });

      expect(claimed?.type).toBe('LESSON_CONTENT');
      expect(await store.claimNext({ capabilities: ['FULL_COURSE', 'LESSON_CONTENT'], now: new Date() })).toBeNull();
    });
  });

  describe('claim', () => {
    it('should succeed only for the first claimer', async () => {
      const job = await store.create(jobData());

      const [first, second] = await Promise.all([
        store.claim(job.id, { now: new Date() }),
        store.claim(job.id, { now: new Date() }),
      ]);

      expect(first?.status).toBe('PROCESSING');
      expect(second).toBeNull();
    });
  });

  describe('updateProgress', () => {
    it('should keep progress non-decreasing while PROCESSING', async () => {
      const job = await store.create(jobData());
      await store.claim(job.id, { now: new Date() });

      await store.updateProgress(job.id, 40, 'Calling AI');
      const updated = await store.updateProgress(job.id, 20, 'Parsing');

      expect(updated.progressPercent).toBe(40);
      expect(updated.progressMessage).toBe('Parsing');
    });

    it('should clamp progress to 100', async () => {
      const job = await store.create(jobData());
      await store.claim(job.id, { now: new Date() });

      const updated = await store.updateProgress(job.id, 140, 'Done');

      expect(updated.progressPercent).toBe(100);
    });

    it('should reject updates outside PROCESSING', async () => {
      const job = await store.create(jobData());

      await expect(store.updateProgress(job.id, 10, 'Early')).rejects.toBeInstanceOf(InvalidStateError);
    });

    it('should report missing jobs', async () => {
      await expect(store.updateProgress('missing', 10, 'x')).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('complete', () => {
    it('should record the outcome', async () => {
      const job = await store.create(jobData());
      await store.claim(job.id, { now: new Date() });

      const { job: done, changed } = await store.complete(job.id, { resultPath: 'tenants/tenant-a/jobs/x/result.json', tokensUsed: 120 });

      expect(changed).toBe(true);
      expect(done.status).toBe('COMPLETED');
      expect(done.progressPercent).toBe(100);
      expect(done.tokensUsed).toBe(120);
      expect(done.completedAt).toBeInstanceOf(Date);
    });

    it('should not complete a cancelled job', async () => {
      const job = await store.create(jobData());
      await store.claim(job.id, { now: new Date() });
      await store.cancel(job.id);

      const { job: after, changed } = await store.complete(job.id, { resultPath: null, tokensUsed: 0 });

      expect(changed).toBe(false);
      expect(after.status).toBe('CANCELLED');
    });
  });

  describe('attempt ownership', () => {
    it('should refuse writes from an attempt the watchdog replaced', async () => {
      const now = new Date();
      const firstClaim = minutesAgo(now, 30);
      const job = await store.create(jobData());
      await store.claim(job.id, { now: firstClaim });
      await store.reclaimStale({ olderThan: minutesAgo(now, 15), now });
      await store.claim(job.id, { now });

      await expect(store.updateProgress(job.id, 50, 'Late', now, firstClaim)).rejects.toThrow(
        'Job was claimed by a later attempt'
      );
      expect((await store.complete(job.id, { resultPath: null, tokensUsed: 10 }, now, firstClaim)).changed).toBe(false);
      const late = await store.fail(job.id, { message: 'late failure', retryable: true, now, claimedAt: firstClaim });
      expect(late.changed).toBe(false);
      expect(late.job.retryCount).toBe(1);

      const { job: done, changed } = await store.complete(job.id, { resultPath: null, tokensUsed: 10 }, now, now);
      expect(changed).toBe(true);
      expect(done.status).toBe('COMPLETED');
    });
  });

  describe('fail', () => {
    it('should requeue three times then fail terminally', async () => {
      const job = await store.create(jobData({ maxRetries: 3 }));
      const observed: JobStatus[] = [job.status];

      for (let attempt = 0; attempt < 4; attempt++) {
        const claimed = await store.claimNext({ capabilities: ['COURSE_OUTLINE'], now: new Date() });
        expect(claimed?.id).toBe(job.id);
        observed.push('PROCESSING');
        const { job: after } = await store.fail(job.id, { message: 'provider timeout', retryable: true, now: new Date() });
        observed.push(after.status);
      }

      expect(observed).toEqual([
        'QUEUED', 'PROCESSING', 'QUEUED', 'PROCESSING', 'QUEUED', 'PROCESSING', 'QUEUED', 'PROCESSING', 'FAILED',
      ]);
      const final = await store.get(job.id);
      expect(final?.retryCount).toBe(3);
      expect(final?.errorMessage).toBe('provider timeout');
    });

    it('should make further fail calls no-ops once FAILED', async () => {
      const job = await store.create(jobData({ maxRetries: 0 }));
      await store.claim(job.id, { now: new Date() });
      await store.fail(job.id, { message: 'first', retryable: true, now: new Date() });

      const { job: after, changed } = await store.fail(job.id, { message: 'second', retryable: true, now: new Date() });

      expect(changed).toBe(false);
      expect(after.status).toBe('FAILED');
      expect(after.errorMessage).toBe('first');
      expect(after.retryCount).toBe(0);
    });

    it('should fail immediately when the error is not retryable', async () => {
      const job = await store.create(jobData());
      await store.claim(job.id, { now: new Date() });

      const { job: after } = await store.fail(job.id, { message: 'invalid credentials', retryable: false, now: new Date() });

      expect(after.status).toBe('FAILED');
      expect(after.retryCount).toBe(0);
    });

    it('should schedule the next attempt using the backoff policy', async () => {
      const now = new Date('2026-01-01T00:00:00.000Z');
      const backoffStore = new InMemoryJobStore({ backoff: (attempt) => attempt * 1000 });
      const job = await backoffStore.create(jobData());
      await backoffStore.claim(job.id, { now });

      const { job: after } = await backoffStore.fail(job.id, { message: 'busy', retryable: true, now });

      expect(after.nextAttemptAt?.toISOString()).toBe('2026-01-01T00:00:01.000Z');
    });
  });

  describe('cancel', () => {
    it('should cancel queued jobs', async () => {
      const job = await store.create(jobData());

      const { job: after, changed } = await store.cancel(job.id);

      expect(changed).toBe(true);
      expect(after.status).toBe('CANCELLED');
    });

    it('should never reopen terminal jobs', async () => {
      const job = await store.create(jobData());
      await store.claim(job.id, { now: new Date() });
      await store.complete(job.id, { resultPath: null, tokensUsed: 5 });

      const { job: after, changed } = await store.cancel(job.id);

      expect(changed).toBe(false);
      expect(after.status).toBe('COMPLETED');
    });

    it('should cancel only the non-terminal children of a parent', async () => {
      const { parent, children } = batchData(3);
      const batch = await store.createBatch(parent, children);
      const first = nth(batch.children, 0);
      const second = nth(batch.children, 1);
      await store.claim(first.id, { now: new Date() });
      await store.complete(first.id, { resultPath: null, tokensUsed: 1 });
      await store.claim(second.id, { now: new Date() });

      const cancelled = await store.cancelChildren(batch.parent.id);

      expect(cancelled).toHaveLength(2);
      expect(cancelled.every((job) => job.status === 'CANCELLED')).toBe(true);
      expect((await store.get(first.id))?.status).toBe('COMPLETED');
    });
  });

  describe('retry', () => {
    it('should requeue a failed job with a fresh retry budget', async () => {
      const job = await store.create(jobData({ maxRetries: 0 }));
      await store.claim(job.id, { now: new Date() });
      await store.fail(job.id, { message: 'boom', retryable: true, now: new Date() });

      const retried = await store.retry(job.id);

      expect(retried.status).toBe('QUEUED');
      expect(retried.retryCount).toBe(0);
      expect(retried.errorMessage).toBeNull();
      expect(retried.completedAt).toBeNull();
    });

    it('should reject retrying a job that has not failed', async () => {
      const job = await store.create(jobData());

      await expect(store.retry(job.id)).rejects.toThrow('Only failed jobs can be retried');
    });
  });

  describe('reclaimStale', () => {
    it('should requeue a job abandoned past the stale timeout', async () => {
      const now = new Date();
      const job = await store.create(jobData());
      await store.claim(job.id, { now: minutesAgo(now, 30) });

      const reclaimed = await store.reclaimStale({ olderThan: minutesAgo(now, 15), now });

      expect(reclaimed.map((item) => item.id)).toEqual([job.id]);
      const after = await store.get(job.id);
      expect(after?.status).toBe('QUEUED');
      expect(after?.retryCount).toBe(1);
      expect(after?.startedAt).toBeNull();
    });

    it('should leave recently started jobs alone', async () => {
      const now = new Date();
      const job = await store.create(jobData());
      await store.claim(job.id, { now: minutesAgo(now, 5) });

      const reclaimed = await store.reclaimStale({ olderThan: minutesAgo(now, 15), now });

      expect(reclaimed).toEqual([]);
      expect((await store.get(job.id))?.status).toBe('PROCESSING');
    });

    it('should fail a stale job that has no retries left', async () => {
      const now = new Date();
      const job = await store.create(jobData({ maxRetries: 0 }));
      await store.claim(job.id, { now: minutesAgo(now, 60) });

      const [reclaimed] = await store.reclaimStale({ olderThan: minutesAgo(now, 15), now });

      expect(reclaimed?.status).toBe('FAILED');
      expect(reclaimed?.retryCount).toBe(0);
    });

    it('should not reclaim batch parents', async () => {
      const now = new Date();
      const { parent, children } = batchData(1);
      await store.createBatch(parent, children);

      const reclaimed = await store.reclaimStale({ olderThan: new Date(now.getTime() + 60_000), now });

      expect(reclaimed).toEqual([]);
    });
  });

  describe('createBatch', () => {
    it('should reject a batch without lessons', async () => {
      await expect(store.createBatch(batchData(0).parent, [])).rejects.toThrow('A batch needs at least one lesson');
      expect((await store.getStats()).processing).toBe(0);
    });

    it('should create a PROCESSING parent and QUEUED children linked to it', async () => {
      const { parent, children } = batchData(5);

      const batch = await store.createBatch(parent, children);

      expect(batch.parent.type).toBe('FULL_COURSE');
      expect(batch.parent.status).toBe('PROCESSING');
      expect(batch.parent.maxRetries).toBe(0);
      expect(batch.parent.progressMessage).toBe('Generating 5 lessons...');
      expect(batch.children).toHaveLength(5);
      expect(batch.children.every((child) => child.parentJobId === batch.parent.id)).toBe(true);
      expect(batch.children.every((child) => child.status === 'QUEUED')).toBe(true);

      for (const child of batch.children) {
        expect(await store.listChildren(child.id)).toEqual([]);
      }
    });

    it('should create nothing when a child is invalid', async () => {
      const { parent } = batchData(1);

      await expect(
        store.createBatch(parent, [jobData({ input: outlineInput() })])
      ).rejects.toThrow('Batch children must be LESSON_CONTENT jobs');
      expect(await store.getStats()).toEqual({ queued: 0, processing: 0, completed: 0, failed: 0, cancelled: 0 });
    });
  });

  describe('find', () => {
    it('should filter by tenant, type and course, newest first', async () => {
      const older = await store.create(jobData({ input: lessonInput('lesson-1', 'course-9') }));
      const newer = await store.create(jobData({ input: lessonInput('lesson-2', 'course-9') }));
      await store.create(jobData({ input: outlineInput('course-9') }));
      await store.create(jobData({ tenantId: OTHER_TENANT, input: lessonInput('lesson-3', 'course-9') }));

      const result = await store.find({ tenantId: TENANT, type: 'LESSON_CONTENT', courseId: 'course-9' });

      expect(result.jobs.map((job) => job.id)).toEqual([newer.id, older.id]);
      expect(result.nextCursor).toBeUndefined();
    });

    it('should paginate with a cursor', async () => {
      const first = await store.create(jobData());
      const second = await store.create(jobData());
      const third = await store.create(jobData());

      const page1 = await store.find({ tenantId: TENANT, limit: 2 });
      const page2 = await store.find({ tenantId: TENANT, limit: 2, cursor: page1.nextCursor });

      expect(page1.jobs.map((job) => job.id)).toEqual([third.id, second.id]);
      expect(page1.nextCursor).toBe(second.id);
      expect(page2.jobs.map((job) => job.id)).toEqual([first.id]);
    });
  });
});
