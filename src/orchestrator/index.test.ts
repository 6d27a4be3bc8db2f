import { describe, it, expect, beforeEach } from 'vitest';
import { createJobHandlers, runJobHandler, type JobHandlerRegistry } from './index.js';
import { InvalidStateError, NotFoundError, TransientProviderError, ValidationError } from '../errors.js';
import { InMemoryCacheBackend, TenantCache } from '../cache/index.js';
import { CachedKnowledgeSource } from '../content/knowledge.js';
import { InMemoryContentRepository } from '../content/repository.js';
import { silentLogger } from '../logger.js';
import { newJob } from '../repositories/transitions.js';
import { InMemoryObjectStorage } from '../storage/object-storage.js';
import type { JobInput } from '../types/job.js';
import { TENANT, batchData, jobData, lessonInput, outlineInput } from '../testing/fixtures.js';
import { ScriptedAIProvider, recordingContext, scriptedAnswers } from '../testing/fakes.js';

const NOW = new Date('2026-03-01T09:00:00Z');

describe('job handlers', () => {
  let ai: ScriptedAIProvider;
  let content: InMemoryContentRepository;
  let storage: InMemoryObjectStorage;
  let knowledge: CachedKnowledgeSource;
  let handlers: JobHandlerRegistry;

  beforeEach(() => {
    ai = new ScriptedAIProvider(scriptedAnswers);
    content = new InMemoryContentRepository();
    storage = new InMemoryObjectStorage();
    knowledge = new CachedKnowledgeSource(
      content,
      new TenantCache(new InMemoryCacheBackend(), { defaultTtlSeconds: 300, logger: silentLogger() })
    );
    handlers = createJobHandlers({ ai, knowledge, content, storage, now: () => NOW });
  });

  async function run(input: JobInput) {
    const job = newJob(jobData({ input }), { now: NOW });
    const { context, checkpoints } = recordingContext(job);
    const outcome = await runJobHandler(handlers, context, job.input);
    return { job, outcome, checkpoints };
  }

  async function readResult(path: string | null): Promise<unknown> {
    if (path === null) throw new Error('expected a result path');
    return JSON.parse(await storage.read(path));
  }

  describe('SME_INGESTION', () => {
    const input: JobInput = {
      type: 'SME_INGESTION',
      smeTaskId: 'task-1',
      smeId: 'sme-1',
      documentPaths: ['docs/handbook.md'],
    };

    it('should extract knowledge from tenant documents and store the chunks', async () => {
      await storage.write('tenants/tenant-a/docs/handbook.md', 'Refund handbook');

      const { job, outcome, checkpoints } = await run(input);

      expect(checkpoints.map((checkpoint) => checkpoint.step)).toEqual([
        'validate',
        'load_documents',
        'extract_knowledge',
        'persist',
      ]);
      expect(ai.requests[0]?.context).toEqual(['Refund handbook']);
      expect(ai.requests[0]?.input).toEqual({
        smeId: 'sme-1',
        smeTaskId: 'task-1',
        documentPaths: ['tenants/tenant-a/docs/handbook.md'],
      });
      expect(await content.listKnowledgeChunks(TENANT)).toEqual([
        { id: 'sme-1-1', smeId: 'sme-1', topic: 'Refunds', content: 'Refunds are issued within 14 days', sourcePath: null },
      ]);
      expect(outcome).toEqual({ resultPath: `tenants/tenant-a/jobs/${job.id}/result.json`, tokensUsed: 120 });
      expect(await readResult(outcome.resultPath)).toEqual({
        jobId: job.id,
        type: 'SME_INGESTION',
        result: { smeId: 'sme-1', chunkCount: 1 },
      });
    });

    it('should refresh cached knowledge rankings after ingestion', async () => {
      await storage.write('tenants/tenant-a/docs/handbook.md', 'Refund handbook');
      const query = { text: 'refunds', limit: 5 };
      expect(await knowledge.rankedChunks(TENANT, query)).toEqual([]);

      await run(input);

      const ranked = await knowledge.rankedChunks(TENANT, query);
      expect(ranked.map((chunk) => chunk.id)).toEqual(['sme-1-1']);
    });

    it('should fail with NotFoundError when a document is missing', async () => {
      await expect(run(input)).rejects.toBeInstanceOf(NotFoundError);
      expect(ai.requests).toHaveLength(0);
    });

    it('should refuse document paths that leave the tenant directory', async () => {
      await expect(run({ ...input, documentPaths: ['../tenant-b/secret.md'] })).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('COURSE_OUTLINE', () => {
    it('should generate and persist an outline from ranked knowledge', async () => {
      await content.saveKnowledgeChunks(TENANT, 'sme-1', [
        { id: 'k1', smeId: 'sme-1', topic: null, content: 'Warehouse safety rules', sourcePath: null },
        { id: 'k2', smeId: 'sme-1', topic: 'Support', content: 'Support agents answer tickets', sourcePath: null },
      ]);

      const { job, outcome, checkpoints } = await run(outlineInput());

      expect(checkpoints.map((checkpoint) => checkpoint.percent)).toEqual([5, 20, 40, 75, 90]);
      expect(ai.requests[0]?.task).toBe('course_outline');
      expect(ai.requests[0]?.context).toEqual(['Support agents answer tickets', 'Warehouse safety rules']);
      expect(await content.getOutline(TENANT, 'course-1')).toEqual({
        title: 'Support Onboarding',
        description: 'First week for new agents',
        sections: [{ title: 'Policies', lessons: [{ title: 'Refund policy', learningObjectives: ['Explain refunds'] }] }],
      });
      expect(outcome).toEqual({ resultPath: `tenants/tenant-a/jobs/${job.id}/result.json`, tokensUsed: 300 });
    });

    it('should treat a malformed outline as a transient provider error', async () => {
      ai = new ScriptedAIProvider({ course_outline: () => ({ output: { title: '' }, tokensUsed: 10 }) });
      handlers = createJobHandlers({ ai, knowledge, content, storage });

      await expect(run(outlineInput())).rejects.toBeInstanceOf(TransientProviderError);
      expect(await content.getOutline(TENANT, 'course-1')).toBeNull();
    });

    it('should reject a blank desired outcome before calling the provider', async () => {
      await expect(run({ ...outlineInput(), desiredOutcome: '   ' })).rejects.toThrow('desiredOutcome must not be blank');
      expect(ai.requests).toHaveLength(0);
    });
  });

  describe('LESSON_CONTENT', () => {
    it('should store the generated lesson with numbered components', async () => {
      const { outcome } = await run(lessonInput('lesson-1'));

      expect(await content.getLesson(TENANT, 'course-1', 'lesson-1')).toEqual({
        courseId: 'course-1',
        lessonId: 'lesson-1',
        title: 'Lesson lesson-1',
        components: [
          { id: 'lesson-1-c1', kind: 'text', content: 'Refunds take 14 days.' },
          { id: 'lesson-1-c2', kind: 'quiz', content: 'How long?' },
        ],
        updatedAt: NOW,
      });
      expect(outcome.tokensUsed).toBe(250);
      expect(ai.requests[0]?.input).toEqual({
        courseId: 'course-1',
        lessonId: 'lesson-1',
        lessonTitle: 'Lesson lesson-1',
        learningObjectives: ['Explain the refund policy'],
      });
    });
  });

  describe('COMPONENT_REGEN', () => {
    const input: JobInput = {
      type: 'COMPONENT_REGEN',
      courseId: 'course-1',
      lessonId: 'lesson-1',
      componentId: 'lesson-1-c1',
      modificationPrompt: 'Make it shorter',
    };

    beforeEach(async () => {
      await content.saveLesson(TENANT, {
        courseId: 'course-1',
        lessonId: 'lesson-1',
        title: 'Refunds',
        components: [
          { id: 'lesson-1-c1', kind: 'text', content: 'Old text' },
          { id: 'lesson-1-c2', kind: 'quiz', content: 'Old quiz' },
        ],
        updatedAt: new Date('2026-01-01T00:00:00Z'),
      });
    });

    it('should replace only the targeted component', async () => {
      const { outcome } = await run(input);

      const lesson = await content.getLesson(TENANT, 'course-1', 'lesson-1');
      expect(lesson?.components).toEqual([
        { id: 'lesson-1-c1', kind: 'text', content: 'Rewritten: Make it shorter' },
        { id: 'lesson-1-c2', kind: 'quiz', content: 'Old quiz' },
      ]);
      expect(lesson?.updatedAt).toEqual(NOW);
      expect(await readResult(outcome.resultPath)).toMatchObject({
        result: { id: 'lesson-1-c1', content: 'Rewritten: Make it shorter' },
      });
    });

    it('should fail with NotFoundError for an unknown component', async () => {
      await expect(run({ ...input, componentId: 'missing' })).rejects.toThrow('Component not found: missing');
      expect(ai.requests).toHaveLength(0);
    });
  });

  it('should refuse to execute a FULL_COURSE parent', async () => {
    const parent = newJob(batchData(1).parent, { now: NOW });
    const { context } = recordingContext(parent);

    await expect(runJobHandler(handlers, context, parent.input)).rejects.toBeInstanceOf(InvalidStateError);
  });
});
