import { z } from 'zod';
import { keySegment } from '../lib/keys.js';

export const NOTIFICATION_TYPES = [
  'generation_started',
  'generation_complete',
  'generation_failed',
  'ingestion_complete',
  'ingestion_failed',
  'outline_ready',
] as const;

export const NOTIFICATION_PRIORITIES = ['low', 'normal', 'high'] as const;

export type NotificationType = typeof NOTIFICATION_TYPES[number];
export type NotificationPriority = typeof NOTIFICATION_PRIORITIES[number];

export interface Notification {
  id: string;
  tenantId: string;
  userId: string;
  type: NotificationType;
  priority: NotificationPriority;
  title: string;
  message: string;
  read: boolean;
  createdAt: Date;
  readAt: Date | null;
  jobId: string | null;
  courseId: string | null;
  taskId: string | null;
  smeId: string | null;
}

export interface CreateNotificationData {
  tenantId: string;
  userId: string;
  type: NotificationType;
  priority: NotificationPriority;
  title: string;
  message: string;
  jobId?: string;
  courseId?: string;
  taskId?: string;
  smeId?: string;
}

export interface NotificationQuery {
  unreadOnly?: boolean;
  cursor?: string;
  limit?: number;
}

export const NotificationSchema = z.object({
  id: z.string(),
  tenantId: z.string(),
  userId: z.string(),
  type: z.enum(NOTIFICATION_TYPES),
  priority: z.enum(NOTIFICATION_PRIORITIES),
  title: z.string(),
  message: z.string(),
  read: z.boolean(),
  createdAt: z.coerce.date(),
  readAt: z.coerce.date().nullable(),
  jobId: z.string().nullable(),
  courseId: z.string().nullable(),
  taskId: z.string().nullable(),
  smeId: z.string().nullable(),
});

export const NotificationQuerySchema = z.object({
  unreadOnly: z.enum(['0', '1']).default('0').transform((value) => value === '1'),
  cursor: z.string().optional(),
  limit: z.preprocess(
    (val) => val === undefined ? 20 : Number(val),
    z.number().int().min(1).max(100)
  ).default(20),
});

export const MarkReadSchema = z.object({
  ids: z.array(z.string().min(1)).min(1).max(100),
});

/** Event published on a user's real-time channel. */
export interface NotificationEvent {
  eventType: 'created';
  notification: Notification;
}

export function userChannel(tenantId: string, userId: string): string {
  return `events:tenant:${keySegment(tenantId)}:user:${keySegment(userId)}`;
}
