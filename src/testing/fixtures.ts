import type { CreateJobData, JobInputOf } from '../types/job.js';

export const TENANT = 'tenant-a';
export const OTHER_TENANT = 'tenant-b';
export const USER = 'user-1';

export function outlineInput(courseId = 'course-1'): JobInputOf<'COURSE_OUTLINE'> {
  return {
    type: 'COURSE_OUTLINE',
    courseId,
    desiredOutcome: 'Onboard new support agents',
    smeIds: ['sme-1'],
    targetAudienceIds: [],
  };
}

export function lessonInput(lessonId = 'lesson-1', courseId = 'course-1'): JobInputOf<'LESSON_CONTENT'> {
  return {
    type: 'LESSON_CONTENT',
    courseId,
    lessonId,
    lessonTitle: `Lesson ${lessonId}`,
    learningObjectives: ['Explain the refund policy'],
  };
}

export function jobData(overrides: Partial<CreateJobData> = {}): CreateJobData {
  return {
    tenantId: TENANT,
    createdByUserId: USER,
    input: outlineInput(),
    ...overrides,
  };
}

export function batchData(lessonCount: number, courseId = 'course-1'): { parent: CreateJobData; children: CreateJobData[] } {
  return {
    parent: jobData({ input: { type: 'FULL_COURSE', courseId, lessonCount } }),
    children: Array.from({ length: lessonCount }, (_, i) => jobData({ input: lessonInput(`lesson-${i + 1}`, courseId) })),
  };
}

export function minutesAgo(now: Date, minutes: number): Date {
  return new Date(now.getTime() - minutes * 60_000);
}

export function nth<T>(items: readonly T[], index: number): T {
  const item = items[index];
  if (item === undefined) {
    throw new Error(`No item at index ${index}`);
  }
  return item;
}
