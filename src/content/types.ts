import { z } from 'zod';

export const KnowledgeChunkSchema = z.object({
  id: z.string(),
  smeId: z.string(),
  topic: z.string().nullable(),
  content: z.string(),
  sourcePath: z.string().nullable(),
});

export const OutlineLessonSchema = z.object({
  title: z.string().min(1),
  learningObjectives: z.array(z.string()).default([]),
});

export const CourseOutlineSchema = z.object({
  title: z.string().min(1),
  description: z.string().default(''),
  sections: z.array(z.object({
    title: z.string().min(1),
    lessons: z.array(OutlineLessonSchema).min(1),
  })).min(1),
});

export const LessonComponentSchema = z.object({
  id: z.string(),
  kind: z.string().min(1),
  content: z.string(),
});

export const LessonSchema = z.object({
  courseId: z.string(),
  lessonId: z.string(),
  title: z.string(),
  components: z.array(LessonComponentSchema),
  updatedAt: z.coerce.date(),
});

export type KnowledgeChunk = z.infer<typeof KnowledgeChunkSchema>;
export type CourseOutline = z.infer<typeof CourseOutlineSchema>;
export type LessonComponent = z.infer<typeof LessonComponentSchema>;
export type Lesson = z.infer<typeof LessonSchema>;
