import { monotonicFactory } from 'ulid';
import { joinKey } from '../lib/keys.js';
import type { UpstashClient } from '../lib/upstash.js';
import {
  NotificationSchema,
  type CreateNotificationData,
  type Notification,
  type NotificationQuery,
} from './types.js';

export interface NotificationRepository {
  create(data: CreateNotificationData): Promise<Notification>;
  list(tenantId: string, userId: string, query?: NotificationQuery): Promise<{ notifications: Notification[]; nextCursor?: string }>;
  unreadCount(tenantId: string, userId: string): Promise<number>;
  /** Marks the listed notifications read if they belong to the user; returns how many changed. */
  markAsRead(tenantId: string, userId: string, ids: string[], now?: Date): Promise<number>;
  markAllAsRead(tenantId: string, userId: string, now?: Date): Promise<number>;
}

function buildNotification(id: string, data: CreateNotificationData, now: Date): Notification {
  return {
    id,
    tenantId: data.tenantId,
    userId: data.userId,
    type: data.type,
    priority: data.priority,
    title: data.title,
    message: data.message,
    read: false,
    createdAt: now,
    readAt: null,
    jobId: data.jobId ?? null,
    courseId: data.courseId ?? null,
    taskId: data.taskId ?? null,
    smeId: data.smeId ?? null,
  };
}

function paginate(
  notifications: Notification[],
  query: NotificationQuery
): { notifications: Notification[]; nextCursor?: string } {
  let page = notifications;
  if (query.unreadOnly) {
    page = page.filter((notification) => !notification.read);
  }
  if (query.cursor) {
    const cursorIndex = page.findIndex((notification) => notification.id === query.cursor);
    if (cursorIndex >= 0) {
      page = page.slice(cursorIndex + 1);
    }
  }
  const limit = query.limit ?? 20;
  const hasMore = page.length > limit;
  if (hasMore) {
    page = page.slice(0, limit);
  }
  return { notifications: page, nextCursor: hasMore ? page[page.length - 1]?.id : undefined };
}

export class InMemoryNotificationRepository implements NotificationRepository {
  private notifications = new Map<string, Notification>();
  private nextId = monotonicFactory();

  async create(data: CreateNotificationData): Promise<Notification> {
    const notification = buildNotification(this.nextId(), data, new Date());
    this.notifications.set(notification.id, notification);
    return notification;
  }

  private owned(tenantId: string, userId: string): Notification[] {
    return Array.from(this.notifications.values())
      .filter((notification) => notification.tenantId === tenantId && notification.userId === userId)
      .sort((a, b) => (a.id < b.id ? 1 : -1));
  }

  async list(tenantId: string, userId: string, query: NotificationQuery = {}) {
    return paginate(this.owned(tenantId, userId), query);
  }

  async unreadCount(tenantId: string, userId: string): Promise<number> {
    return this.owned(tenantId, userId).filter((notification) => !notification.read).length;
  }

  async markAsRead(tenantId: string, userId: string, ids: string[], now: Date = new Date()): Promise<number> {
    let changed = 0;
    for (const id of ids) {
      const notification = this.notifications.get(id);
      if (!notification || notification.tenantId !== tenantId || notification.userId !== userId || notification.read) {
        continue;
      }
      this.notifications.set(id, { ...notification, read: true, readAt: now });
      changed++;
    }
    return changed;
  }

  async markAllAsRead(tenantId: string, userId: string, now: Date = new Date()): Promise<number> {
    const unread = this.owned(tenantId, userId).filter((notification) => !notification.read);
    return this.markAsRead(tenantId, userId, unread.map((notification) => notification.id), now);
  }
}

/**
 * Notifications as JSON documents, with a per-user sorted set for listing and
 * a per-user set of unread ids.
 */
export class RedisNotificationRepository implements NotificationRepository {
  private nextId = monotonicFactory();

  constructor(private client: UpstashClient, private prefix = '') {}

  private notificationKey(id: string): string {
    return `${this.prefix}notification:${id}`;
  }

  private userKey(tenantId: string, userId: string): string {
    return `${this.prefix}notifications:${joinKey(tenantId, userId)}`;
  }

  private unreadKey(tenantId: string, userId: string): string {
    return `${this.prefix}notifications:unread:${joinKey(tenantId, userId)}`;
  }

  private serialize(notification: Notification): string {
    return JSON.stringify({
      ...notification,
      createdAt: notification.createdAt.toISOString(),
      readAt: notification.readAt?.toISOString() ?? null,
    });
  }

  async create(data: CreateNotificationData): Promise<Notification> {
    const notification = buildNotification(this.nextId(), data, new Date());
    await this.client.command(['SET', this.notificationKey(notification.id), this.serialize(notification)]);
    await this.client.command(['ZADD', this.userKey(data.tenantId, data.userId), notification.createdAt.getTime(), notification.id]);
    await this.client.command(['SADD', this.unreadKey(data.tenantId, data.userId), notification.id]);
    return notification;
  }

  private async load(ids: string[]): Promise<Notification[]> {
    if (ids.length === 0) return [];
    const data = await this.client.nullableStrings(['MGET', ...ids.map((id) => this.notificationKey(id))]);
    return data
      .filter((item): item is string => item !== null)
      .map((item) => NotificationSchema.parse(JSON.parse(item)));
  }

  async list(tenantId: string, userId: string, query: NotificationQuery = {}) {
    const ids = await this.client.strings(['ZREVRANGE', this.userKey(tenantId, userId), 0, -1]);
    const notifications = (await this.load(ids))
      .filter((notification) => notification.tenantId === tenantId && notification.userId === userId);
    return paginate(notifications.sort((a, b) => (a.id < b.id ? 1 : -1)), query);
  }

  async unreadCount(tenantId: string, userId: string): Promise<number> {
    return this.client.number(['SCARD', this.unreadKey(tenantId, userId)]);
  }

  async markAsRead(tenantId: string, userId: string, ids: string[], now: Date = new Date()): Promise<number> {
    let changed = 0;
    for (const notification of await this.load(ids)) {
      if (notification.tenantId !== tenantId || notification.userId !== userId || notification.read) {
        continue;
      }
      const removed = await this.client.number(['SREM', this.unreadKey(tenantId, userId), notification.id]);
      if (removed === 0) continue;
      await this.client.command(['SET', this.notificationKey(notification.id), this.serialize({ ...notification, read: true, readAt: now })]);
      changed++;
    }
    return changed;
  }

  async markAllAsRead(tenantId: string, userId: string, now: Date = new Date()): Promise<number> {
    const ids = await this.client.strings(['SMEMBERS', this.unreadKey(tenantId, userId)]);
    return this.markAsRead(tenantId, userId, ids, now);
  }
}
