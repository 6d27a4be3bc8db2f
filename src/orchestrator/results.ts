import { jobResultPath, type ObjectStorage } from '../storage/object-storage.js';
import type { GenerationJob, JobOutcome } from '../types/job.js';

/** Writes the job's result document and returns the outcome pointing at it. */
export async function writeResult(
  storage: ObjectStorage,
  job: GenerationJob,
  result: unknown,
  tokensUsed: number
): Promise<JobOutcome> {
  const resultPath = jobResultPath(job.tenantId, job.id);
  await storage.write(resultPath, JSON.stringify({ jobId: job.id, type: job.type, result }, null, 2));
  return { resultPath, tokensUsed };
}
