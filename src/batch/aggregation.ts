import type { GenerationJob } from '../types/job.js';

/**
 * How a parent job resolves when its children finish.
 *
 * - `fail-fast`: the first FAILED child fails the parent; COMPLETED once every child completed.
 * - `wait-all`: waits for every child to be terminal; COMPLETED only if all completed.
 * - `best-effort`: waits for every child to be terminal; COMPLETED if at least one
 *   completed, recording how many did not.
 */
export type AggregationPolicy = 'fail-fast' | 'wait-all' | 'best-effort';

export type AggregateDecision =
  | { kind: 'pending'; percent: number; message: string }
  | { kind: 'completed'; message: string; errorMessage: string | null }
  | { kind: 'failed'; errorMessage: string };

export interface ChildCounts {
  total: number;
  completed: number;
  failed: number;
  cancelled: number;
  terminal: number;
}

export function countChildren(children: readonly GenerationJob[]): ChildCounts {
  const counts: ChildCounts = { total: children.length, completed: 0, failed: 0, cancelled: 0, terminal: 0 };
  for (const child of children) {
    if (child.status === 'COMPLETED') counts.completed++;
    else if (child.status === 'FAILED') counts.failed++;
    else if (child.status === 'CANCELLED') counts.cancelled++;
  }
  counts.terminal = counts.completed + counts.failed + counts.cancelled;
  return counts;
}

function describeShortfall(counts: ChildCounts): string {
  const parts: string[] = [];
  if (counts.failed > 0) parts.push(`${counts.failed} lesson(s) failed to generate`);
  if (counts.cancelled > 0) parts.push(`${counts.cancelled} lesson(s) cancelled`);
  return parts.join('; ');
}

export function aggregateChildren(children: readonly GenerationJob[], policy: AggregationPolicy): AggregateDecision {
  const counts = countChildren(children);

  if (policy === 'fail-fast' && counts.failed > 0) {
    return { kind: 'failed', errorMessage: describeShortfall(counts) };
  }

  if (counts.total === 0 || counts.terminal < counts.total) {
    const done = counts.total === 0 ? 0 : counts.terminal / counts.total;
    return {
      kind: 'pending',
      percent: 10 + Math.floor(90 * done),
      message: `Generated ${counts.completed} of ${counts.total} lessons...`,
    };
  }

  if (counts.completed === counts.total) {
    return { kind: 'completed', message: 'All lessons generated successfully', errorMessage: null };
  }

  if (policy === 'best-effort' && counts.completed > 0) {
    return {
      kind: 'completed',
      message: `Generated ${counts.completed} of ${counts.total} lessons`,
      errorMessage: describeShortfall(counts),
    };
  }

  return { kind: 'failed', errorMessage: describeShortfall(counts) };
}
