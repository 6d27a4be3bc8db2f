import type { Logger } from '../logger.js';
import type { GenerationJob, JobInputOf, JobOutcome, WorkJobType } from '../types/job.js';

export interface StepContext {
  job: GenerationJob;
  signal: AbortSignal;
  logger: Logger;
  /**
   * Reports entry into a step. Throws JobCancelledError when the job was
   * cancelled or the worker is shutting down.
   */
  checkpoint(step: string, percent: number, message: string): Promise<void>;
}

export interface WorkflowContext<T extends WorkJobType> extends StepContext {
  input: JobInputOf<T>;
}

export interface JobHandler<T extends WorkJobType> {
  readonly type: T;
  execute(context: WorkflowContext<T>): Promise<JobOutcome>;
}

export interface StepProgress {
  percent: number;
  message: string;
}

type Run<I, O> = (value: I, context: StepContext) => Promise<O>;

/**
 * An ordered chain of named steps. Each step receives the previous step's
 * value; the checkpoint runs at every boundary before the step body.
 *
 * ```ts
 * Workflow.start<Input>()
 *   .step('gather_context', { percent: 20, message: 'Gathering knowledge...' }, loadChunks)
 *   .step('generate', { percent: 40, message: 'Generating...' }, callModel)
 * ```
 */
export class Workflow<I, O> {
  private constructor(
    private readonly run: Run<I, O>,
    readonly steps: readonly string[]
  ) {}

  static start<I>(): Workflow<I, I> {
    return new Workflow<I, I>(async (value) => value, []);
  }

  step<N>(
    name: string,
    progress: StepProgress,
    body: (value: O, context: StepContext) => Promise<N> | N
  ): Workflow<I, N> {
    const previous = this.run;
    return new Workflow<I, N>(async (value, context) => {
      const current = await previous(value, context);
      await context.checkpoint(name, progress.percent, progress.message);
      context.logger.debug({ step: name }, 'Workflow step started');
      return body(current, context);
    }, [...this.steps, name]);
  }

  execute(value: I, context: StepContext): Promise<O> {
    return this.run(value, context);
  }
}
