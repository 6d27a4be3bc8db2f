import { InvalidStateError } from '../errors.js';
import type { JobInput, JobOutcome, WorkJobType } from '../types/job.js';
import { ComponentRegenHandler } from './handlers/component-regen.js';
import { CourseOutlineHandler } from './handlers/course-outline.js';
import type { HandlerDeps } from './handlers/deps.js';
import { LessonContentHandler } from './handlers/lesson-content.js';
import { SmeIngestionHandler } from './handlers/sme-ingestion.js';
import type { JobHandler, StepContext } from './workflow.js';

export * from './ai-provider.js';
export * from './workflow.js';
export type { HandlerDeps } from './handlers/deps.js';

export type JobHandlerRegistry = { [T in WorkJobType]: JobHandler<T> };

export function createJobHandlers(deps: HandlerDeps): JobHandlerRegistry {
  return {
    SME_INGESTION: new SmeIngestionHandler(deps),
    COURSE_OUTLINE: new CourseOutlineHandler(deps),
    LESSON_CONTENT: new LessonContentHandler(deps),
    COMPONENT_REGEN: new ComponentRegenHandler(deps),
  };
}

/** Routes a job to the handler for its input type. */
export function runJobHandler(handlers: JobHandlerRegistry, context: StepContext, input: JobInput): Promise<JobOutcome> {
  switch (input.type) {
    case 'SME_INGESTION':
      return handlers.SME_INGESTION.execute({ ...context, input });
    case 'COURSE_OUTLINE':
      return handlers.COURSE_OUTLINE.execute({ ...context, input });
    case 'LESSON_CONTENT':
      return handlers.LESSON_CONTENT.execute({ ...context, input });
    case 'COMPONENT_REGEN':
      return handlers.COMPONENT_REGEN.execute({ ...context, input });
    case 'FULL_COURSE':
      throw new InvalidStateError('FULL_COURSE jobs are aggregated from their children and never executed', {
        jobId: context.job.id,
      });
  }
}
