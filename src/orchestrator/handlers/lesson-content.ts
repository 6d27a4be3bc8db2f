import { z } from 'zod';
import type { Lesson } from '../../content/types.js';
import type { JobOutcome } from '../../types/job.js';
import { parseOutput } from '../ai-provider.js';
import { writeResult } from '../results.js';
import { Workflow, type JobHandler, type WorkflowContext } from '../workflow.js';
import type { HandlerDeps } from './deps.js';

const CONTEXT_CHUNKS = 10;

const GeneratedLessonSchema = z.object({
  title: z.string().min(1).optional(),
  components: z.array(z.object({
    kind: z.string().min(1),
    content: z.string(),
  })).min(1),
});

export class LessonContentHandler implements JobHandler<'LESSON_CONTENT'> {
  readonly type = 'LESSON_CONTENT';
  private workflow: Workflow<WorkflowContext<'LESSON_CONTENT'>, JobOutcome>;

  constructor(private deps: HandlerDeps) {
    const now = deps.now ?? (() => new Date());

    this.workflow = Workflow.start<WorkflowContext<'LESSON_CONTENT'>>()
      .step('gather_context', { percent: 10, message: 'Gathering knowledge...' }, async ({ input, job }) => ({
        input,
        chunks: await this.deps.knowledge.rankedChunks(job.tenantId, {
          text: [input.sectionTitle ?? '', input.lessonTitle, ...input.learningObjectives].join(' '),
          limit: CONTEXT_CHUNKS,
        }),
      }))
      .step('generate', { percent: 30, message: 'Writing lesson...' }, async ({ input, chunks }, { job }) => ({
        input,
        response: await this.deps.ai.generate({
          task: 'lesson_content',
          tenantId: job.tenantId,
          input: {
            courseId: input.courseId,
            lessonId: input.lessonId,
            lessonTitle: input.lessonTitle,
            learningObjectives: input.learningObjectives,
            ...(input.sectionTitle !== undefined && { sectionTitle: input.sectionTitle }),
          },
          context: chunks.map((chunk) => chunk.content),
        }),
      }))
      .step('parse', { percent: 70, message: 'Assembling lesson components...' }, ({ input, response }) => {
        const generated = parseOutput(GeneratedLessonSchema, response.output, 'lesson_content');
        const lesson: Lesson = {
          courseId: input.courseId,
          lessonId: input.lessonId,
          title: generated.title ?? input.lessonTitle,
          components: generated.components.map((component, index) => ({
            id: `${input.lessonId}-c${index + 1}`,
            kind: component.kind,
            content: component.content,
          })),
          updatedAt: now(),
        };
        return { lesson, tokensUsed: response.tokensUsed };
      })
      .step('persist', { percent: 90, message: 'Saving lesson...' }, async ({ lesson, tokensUsed }, { job }) => {
        await this.deps.content.saveLesson(job.tenantId, lesson);
        return writeResult(this.deps.storage, job, lesson, tokensUsed);
      });
  }

  execute(context: WorkflowContext<'LESSON_CONTENT'>): Promise<JobOutcome> {
    return this.workflow.execute(context, context);
  }
}
