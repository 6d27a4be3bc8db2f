import { z } from 'zod';
import { JOB_STATUSES, JOB_TYPES } from '../types/job.js';

const id = z.string().min(1).max(128);

export const JobTypeSchema = z.enum(JOB_TYPES);
export const JobStatusSchema = z.enum(JOB_STATUSES);

export const SmeIngestionInputSchema = z.object({
  type: z.literal('SME_INGESTION'),
  smeTaskId: id,
  smeId: id,
  submissionId: id.optional(),
  documentPaths: z.array(z.string().min(1)).min(1).max(50),
});

export const CourseOutlineInputSchema = z.object({
  type: z.literal('COURSE_OUTLINE'),
  courseId: id,
  desiredOutcome: z.string().min(1).max(4000),
  smeIds: z.array(id).default([]),
  targetAudienceIds: z.array(id).default([]),
  additionalContext: z.string().max(8000).optional(),
});

export const LessonContentInputSchema = z.object({
  type: z.literal('LESSON_CONTENT'),
  courseId: id,
  lessonId: id,
  sectionTitle: z.string().max(500).optional(),
  lessonTitle: z.string().min(1).max(500),
  learningObjectives: z.array(z.string().min(1)).default([]),
});

export const ComponentRegenInputSchema = z.object({
  type: z.literal('COMPONENT_REGEN'),
  courseId: id,
  lessonId: id,
  componentId: id,
  modificationPrompt: z.string().min(1).max(4000),
});

export const FullCourseInputSchema = z.object({
  type: z.literal('FULL_COURSE'),
  courseId: id,
  lessonCount: z.number().int().min(1),
});

/** Inputs a caller may submit directly; FULL_COURSE only comes from a fan-out. */
export const CreatableJobInputSchema = z.discriminatedUnion('type', [
  SmeIngestionInputSchema,
  CourseOutlineInputSchema,
  LessonContentInputSchema,
  ComponentRegenInputSchema,
]);

export const JobInputSchema = z.discriminatedUnion('type', [
  SmeIngestionInputSchema,
  CourseOutlineInputSchema,
  LessonContentInputSchema,
  ComponentRegenInputSchema,
  FullCourseInputSchema,
]);

export const CreateJobSchema = z.object({
  input: CreatableJobInputSchema,
  maxRetries: z.number().int().min(0).max(10).optional(),
});

export const LessonRequestSchema = z.object({
  lessonId: id,
  sectionTitle: z.string().max(500).optional(),
  lessonTitle: z.string().min(1).max(500),
  learningObjectives: z.array(z.string().min(1)).default([]),
});

export const GenerateAllLessonsSchema = z.object({
  lessons: z.array(LessonRequestSchema).min(1).max(200),
});

export const JobQuerySchema = z.object({
  type: JobTypeSchema.optional(),
  status: JobStatusSchema.optional(),
  courseId: z.string().optional(),
  parentJobId: z.string().optional(),
  cursor: z.string().optional(),
  limit: z.preprocess(
    (val) => val === undefined ? 50 : Number(val),
    z.number().int().min(1).max(100)
  ).default(50),
});

export const JobParamsSchema = z.object({
  jobId: z.string().min(1),
});

export const CourseParamsSchema = z.object({
  courseId: id,
});

export type CreatableJobInput = z.infer<typeof CreatableJobInputSchema>;
export type LessonRequest = z.infer<typeof LessonRequestSchema>;
export type CreateJobRequest = z.infer<typeof CreateJobSchema>;
export type JobQueryRequest = z.infer<typeof JobQuerySchema>;
