import { describe, it, expect } from 'vitest';
import { aggregateChildren, countChildren } from './aggregation.js';
import { newJob } from '../repositories/transitions.js';
import { jobData, lessonInput } from '../testing/fixtures.js';
import type { GenerationJob, JobStatus } from '../types/job.js';

function children(...statuses: JobStatus[]): GenerationJob[] {
  const now = new Date();
  return statuses.map((status, i) => ({
    ...newJob(jobData({ input: lessonInput(`lesson-${i}`) }), { now, parentJobId: 'parent-1' }),
    status,
  }));
}

describe('aggregateChildren', () => {
  it('should count children by status', () => {
    expect(countChildren(children('COMPLETED', 'FAILED', 'CANCELLED', 'QUEUED', 'PROCESSING'))).toEqual({
      total: 5,
      completed: 1,
      failed: 1,
      cancelled: 1,
      terminal: 3,
    });
  });

  it('should report progress while children are running', () => {
    const decision = aggregateChildren(children('COMPLETED', 'COMPLETED', 'QUEUED', 'PROCESSING', 'QUEUED'), 'wait-all');

    expect(decision).toEqual({ kind: 'pending', percent: 46, message: 'Generated 2 of 5 lessons...' });
  });

  it('should complete when all children completed under every policy', () => {
    const all = children('COMPLETED', 'COMPLETED', 'COMPLETED', 'COMPLETED', 'COMPLETED');

    for (const policy of ['fail-fast', 'wait-all', 'best-effort'] as const) {
      expect(aggregateChildren(all, policy)).toEqual({
        kind: 'completed',
        message: 'All lessons generated successfully',
        errorMessage: null,
      });
    }
  });

  describe('fail-fast', () => {
    it('should fail on the first failed child even while others run', () => {
      const decision = aggregateChildren(children('FAILED', 'QUEUED', 'QUEUED', 'QUEUED', 'QUEUED'), 'fail-fast');

      expect(decision).toEqual({ kind: 'failed', errorMessage: '1 lesson(s) failed to generate' });
    });
  });

  describe('wait-all', () => {
    it('should wait for running children before failing', () => {
      const decision = aggregateChildren(children('FAILED', 'PROCESSING'), 'wait-all');

      expect(decision.kind).toBe('pending');
    });

    it('should fail once every child is terminal and one failed', () => {
      const decision = aggregateChildren(children('FAILED', 'COMPLETED', 'FAILED'), 'wait-all');

      expect(decision).toEqual({ kind: 'failed', errorMessage: '2 lesson(s) failed to generate' });
    });
  });

  describe('best-effort', () => {
    it('should complete with the shortfall recorded when some children completed', () => {
      const decision = aggregateChildren(children('COMPLETED', 'FAILED', 'CANCELLED', 'COMPLETED'), 'best-effort');

      expect(decision).toEqual({
        kind: 'completed',
        message: 'Generated 2 of 4 lessons',
        errorMessage: '1 lesson(s) failed to generate; 1 lesson(s) cancelled',
      });
    });

    it('should fail when no child completed', () => {
      const decision = aggregateChildren(children('FAILED', 'FAILED'), 'best-effort');

      expect(decision).toEqual({ kind: 'failed', errorMessage: '2 lesson(s) failed to generate' });
    });
  });

  it('should not complete a parent whose children were cancelled', () => {
    const decision = aggregateChildren(children('COMPLETED', 'CANCELLED'), 'fail-fast');

    expect(decision).toEqual({ kind: 'failed', errorMessage: '1 lesson(s) cancelled' });
  });
});
