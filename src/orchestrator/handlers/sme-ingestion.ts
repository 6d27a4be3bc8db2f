import { z } from 'zod';
import { tenantPath } from '../../storage/object-storage.js';
import type { KnowledgeChunk } from '../../content/types.js';
import type { JobInputOf, JobOutcome } from '../../types/job.js';
import { parseOutput } from '../ai-provider.js';
import { writeResult } from '../results.js';
import { Workflow, type JobHandler, type WorkflowContext } from '../workflow.js';
import type { HandlerDeps } from './deps.js';

const ExtractedKnowledgeSchema = z.object({
  chunks: z.array(z.object({
    topic: z.string().nullable().default(null),
    content: z.string().min(1),
    sourcePath: z.string().nullable().default(null),
  })),
});

interface Document {
  path: string;
  body: string;
}

export class SmeIngestionHandler implements JobHandler<'SME_INGESTION'> {
  readonly type = 'SME_INGESTION';
  private workflow: Workflow<WorkflowContext<'SME_INGESTION'>, JobOutcome>;

  constructor(private deps: HandlerDeps) {
    this.workflow = Workflow.start<WorkflowContext<'SME_INGESTION'>>()
      .step('validate', { percent: 5, message: 'Validating documents...' }, ({ input, job }) => ({
        input,
        paths: input.documentPaths.map((documentPath) => tenantPath(job.tenantId, documentPath)),
      }))
      .step('load_documents', { percent: 15, message: 'Loading documents...' }, async ({ input, paths }) => ({
        input,
        documents: await this.loadDocuments(paths),
      }))
      .step('extract_knowledge', { percent: 40, message: 'Extracting knowledge...' }, ({ input, documents }, context) =>
        this.extract(input, documents, context.job.tenantId)
      )
      .step('persist', { percent: 85, message: 'Saving knowledge...' }, async ({ input, chunks, tokensUsed }, context) => {
        await this.deps.content.saveKnowledgeChunks(context.job.tenantId, input.smeId, chunks);
        await this.deps.knowledge.invalidate(context.job.tenantId);
        return writeResult(this.deps.storage, context.job, { smeId: input.smeId, chunkCount: chunks.length }, tokensUsed);
      });
  }

  execute(context: WorkflowContext<'SME_INGESTION'>): Promise<JobOutcome> {
    return this.workflow.execute(context, context);
  }

  private async loadDocuments(paths: string[]): Promise<Document[]> {
    const documents: Document[] = [];
    for (const path of paths) {
      documents.push({ path, body: await this.deps.storage.read(path) });
    }
    return documents;
  }

  private async extract(input: JobInputOf<'SME_INGESTION'>, documents: Document[], tenantId: string) {
    const response = await this.deps.ai.generate({
      task: 'extract_knowledge',
      tenantId,
      input: { smeId: input.smeId, smeTaskId: input.smeTaskId, documentPaths: documents.map((doc) => doc.path) },
      context: documents.map((doc) => doc.body),
    });
    const extracted = parseOutput(ExtractedKnowledgeSchema, response.output, 'extract_knowledge');
    const chunks: KnowledgeChunk[] = extracted.chunks.map((chunk, index) => ({
      id: `${input.smeId}-${index + 1}`,
      smeId: input.smeId,
      topic: chunk.topic,
      content: chunk.content,
      sourcePath: chunk.sourcePath,
    }));
    return { input, chunks, tokensUsed: response.tokensUsed };
  }
}
