import { ValidationError } from '../../errors.js';
import { CourseOutlineSchema } from '../../content/types.js';
import type { JobOutcome } from '../../types/job.js';
import { parseOutput } from '../ai-provider.js';
import { writeResult } from '../results.js';
import { Workflow, type JobHandler, type WorkflowContext } from '../workflow.js';
import type { HandlerDeps } from './deps.js';

const CONTEXT_CHUNKS = 20;

export class CourseOutlineHandler implements JobHandler<'COURSE_OUTLINE'> {
  readonly type = 'COURSE_OUTLINE';
  private workflow: Workflow<WorkflowContext<'COURSE_OUTLINE'>, JobOutcome>;

  constructor(private deps: HandlerDeps) {
    this.workflow = Workflow.start<WorkflowContext<'COURSE_OUTLINE'>>()
      .step('validate', { percent: 5, message: 'Validating course request...' }, ({ input }) => {
        const desiredOutcome = input.desiredOutcome.trim();
        if (!desiredOutcome) {
          throw new ValidationError('desiredOutcome must not be blank');
        }
        return { ...input, desiredOutcome };
      })
      .step('gather_context', { percent: 20, message: 'Gathering knowledge...' }, async (input, { job }) => ({
        input,
        chunks: await this.deps.knowledge.rankedChunks(job.tenantId, {
          text: [input.desiredOutcome, input.additionalContext ?? ''].join(' '),
          smeIds: input.smeIds,
          limit: CONTEXT_CHUNKS,
        }),
      }))
      .step('generate', { percent: 40, message: 'Generating course outline...' }, async ({ input, chunks }, { job }) => ({
        courseId: input.courseId,
        response: await this.deps.ai.generate({
          task: 'course_outline',
          tenantId: job.tenantId,
          input: {
            courseId: input.courseId,
            desiredOutcome: input.desiredOutcome,
            targetAudienceIds: input.targetAudienceIds,
            ...(input.additionalContext !== undefined && { additionalContext: input.additionalContext }),
          },
          context: chunks.map((chunk) => chunk.content),
        }),
      }))
      .step('parse', { percent: 75, message: 'Structuring outline...' }, ({ courseId, response }) => ({
        courseId,
        outline: parseOutput(CourseOutlineSchema, response.output, 'course_outline'),
        tokensUsed: response.tokensUsed,
      }))
      .step('persist', { percent: 90, message: 'Saving outline...' }, async ({ courseId, outline, tokensUsed }, { job }) => {
        await this.deps.content.saveOutline(job.tenantId, courseId, outline);
        return writeResult(this.deps.storage, job, outline, tokensUsed);
      });
  }

  execute(context: WorkflowContext<'COURSE_OUTLINE'>): Promise<JobOutcome> {
    return this.workflow.execute(context, context);
  }
}
