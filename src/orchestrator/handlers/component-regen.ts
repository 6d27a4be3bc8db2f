import { z } from 'zod';
import { NotFoundError } from '../../errors.js';
import type { JobOutcome } from '../../types/job.js';
import { parseOutput } from '../ai-provider.js';
import { writeResult } from '../results.js';
import { Workflow, type JobHandler, type WorkflowContext } from '../workflow.js';
import type { HandlerDeps } from './deps.js';

const RegeneratedComponentSchema = z.object({
  content: z.string().min(1),
});

export class ComponentRegenHandler implements JobHandler<'COMPONENT_REGEN'> {
  readonly type = 'COMPONENT_REGEN';
  private workflow: Workflow<WorkflowContext<'COMPONENT_REGEN'>, JobOutcome>;

  constructor(private deps: HandlerDeps) {
    const now = deps.now ?? (() => new Date());

    this.workflow = Workflow.start<WorkflowContext<'COMPONENT_REGEN'>>()
      .step('load_component', { percent: 10, message: 'Loading component...' }, async ({ input, job }) => {
        const lesson = await this.deps.content.getLesson(job.tenantId, input.courseId, input.lessonId);
        if (!lesson) {
          throw new NotFoundError('Lesson', input.lessonId);
        }
        const component = lesson.components.find((candidate) => candidate.id === input.componentId);
        if (!component) {
          throw new NotFoundError('Component', input.componentId);
        }
        return { input, lesson, component };
      })
      .step('generate', { percent: 30, message: 'Regenerating component...' }, async (loaded, { job }) => ({
        ...loaded,
        response: await this.deps.ai.generate({
          task: 'component_regen',
          tenantId: job.tenantId,
          input: {
            kind: loaded.component.kind,
            content: loaded.component.content,
            modificationPrompt: loaded.input.modificationPrompt,
          },
          context: [],
        }),
      }))
      .step('persist', { percent: 85, message: 'Saving component...' }, async ({ lesson, component, response }, { job }) => {
        const regenerated = parseOutput(RegeneratedComponentSchema, response.output, 'component_regen');
        const updated = { ...component, content: regenerated.content };
        await this.deps.content.saveLesson(job.tenantId, {
          ...lesson,
          components: lesson.components.map((candidate) => candidate.id === updated.id ? updated : candidate),
          updatedAt: now(),
        });
        return writeResult(this.deps.storage, job, updated, response.tokensUsed);
      });
  }

  execute(context: WorkflowContext<'COMPONENT_REGEN'>): Promise<JobOutcome> {
    return this.workflow.execute(context, context);
  }
}
