import { z } from 'zod';
import { joinKey } from '../lib/keys.js';
import type { UpstashClient } from '../lib/upstash.js';
import {
  CourseOutlineSchema,
  KnowledgeChunkSchema,
  LessonSchema,
  type CourseOutline,
  type KnowledgeChunk,
  type Lesson,
} from './types.js';

/** Domain results written by the generation workflows. */
export interface ContentRepository {
  /** Replaces the knowledge extracted for one subject-matter expert. */
  saveKnowledgeChunks(tenantId: string, smeId: string, chunks: KnowledgeChunk[]): Promise<void>;
  /** All chunks for the tenant, or only those of `smeIds` when given. */
  listKnowledgeChunks(tenantId: string, smeIds?: readonly string[]): Promise<KnowledgeChunk[]>;
  saveOutline(tenantId: string, courseId: string, outline: CourseOutline): Promise<void>;
  getOutline(tenantId: string, courseId: string): Promise<CourseOutline | null>;
  saveLesson(tenantId: string, lesson: Lesson): Promise<void>;
  getLesson(tenantId: string, courseId: string, lessonId: string): Promise<Lesson | null>;
}

export class InMemoryContentRepository implements ContentRepository {
  private knowledge = new Map<string, Map<string, KnowledgeChunk[]>>();
  private outlines = new Map<string, CourseOutline>();
  private lessons = new Map<string, Lesson>();

  async saveKnowledgeChunks(tenantId: string, smeId: string, chunks: KnowledgeChunk[]): Promise<void> {
    const bySme = this.knowledge.get(tenantId) ?? new Map<string, KnowledgeChunk[]>();
    bySme.set(smeId, chunks);
    this.knowledge.set(tenantId, bySme);
  }

  async listKnowledgeChunks(tenantId: string, smeIds?: readonly string[]): Promise<KnowledgeChunk[]> {
    const bySme = this.knowledge.get(tenantId);
    if (!bySme) return [];
    const selected = smeIds && smeIds.length > 0 ? smeIds : Array.from(bySme.keys());
    return selected.flatMap((smeId) => bySme.get(smeId) ?? []);
  }

  async saveOutline(tenantId: string, courseId: string, outline: CourseOutline): Promise<void> {
    this.outlines.set(joinKey(tenantId, courseId), outline);
  }

  async getOutline(tenantId: string, courseId: string): Promise<CourseOutline | null> {
    return this.outlines.get(joinKey(tenantId, courseId)) ?? null;
  }

  async saveLesson(tenantId: string, lesson: Lesson): Promise<void> {
    this.lessons.set(joinKey(tenantId, lesson.courseId, lesson.lessonId), lesson);
  }

  async getLesson(tenantId: string, courseId: string, lessonId: string): Promise<Lesson | null> {
    return this.lessons.get(joinKey(tenantId, courseId, lessonId)) ?? null;
  }
}

const KnowledgeChunksSchema = z.array(KnowledgeChunkSchema);

export class RedisContentRepository implements ContentRepository {
  constructor(private client: UpstashClient, private prefix = '') {}

  private key(tenantId: string, ...parts: string[]): string {
    return `${this.prefix}content:${joinKey(tenantId, ...parts)}`;
  }

  async saveKnowledgeChunks(tenantId: string, smeId: string, chunks: KnowledgeChunk[]): Promise<void> {
    await this.client.command(['SET', this.key(tenantId, 'knowledge', smeId), JSON.stringify(chunks)]);
    await this.client.command(['SADD', this.key(tenantId, 'knowledge-index'), smeId]);
  }

  async listKnowledgeChunks(tenantId: string, smeIds?: readonly string[]): Promise<KnowledgeChunk[]> {
    const selected = smeIds && smeIds.length > 0
      ? [...smeIds]
      : await this.client.strings(['SMEMBERS', this.key(tenantId, 'knowledge-index')]);
    if (selected.length === 0) return [];

    const data = await this.client.nullableStrings(['MGET', ...selected.map((smeId) => this.key(tenantId, 'knowledge', smeId))]);
    return data
      .filter((item): item is string => item !== null)
      .flatMap((item) => KnowledgeChunksSchema.parse(JSON.parse(item)));
  }

  async saveOutline(tenantId: string, courseId: string, outline: CourseOutline): Promise<void> {
    await this.client.command(['SET', this.key(tenantId, 'outline', courseId), JSON.stringify(outline)]);
  }

  async getOutline(tenantId: string, courseId: string): Promise<CourseOutline | null> {
    const data = await this.client.string(['GET', this.key(tenantId, 'outline', courseId)]);
    return data ? CourseOutlineSchema.parse(JSON.parse(data)) : null;
  }

  async saveLesson(tenantId: string, lesson: Lesson): Promise<void> {
    await this.client.command([
      'SET',
      this.key(tenantId, 'lesson', lesson.courseId, lesson.lessonId),
      JSON.stringify({ ...lesson, updatedAt: lesson.updatedAt.toISOString() }),
    ]);
  }

  async getLesson(tenantId: string, courseId: string, lessonId: string): Promise<Lesson | null> {
    const data = await this.client.string(['GET', this.key(tenantId, 'lesson', courseId, lessonId)]);
    return data ? LessonSchema.parse(JSON.parse(data)) : null;
  }
}
