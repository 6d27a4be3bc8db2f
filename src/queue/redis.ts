import { monotonicFactory } from 'ulid';
import type { UpstashClient } from '../lib/upstash.js';
import {
  DEFAULT_TASK_MAX_RETRIES,
  TaskSchema,
  type EnqueueOptions,
  type NackResult,
  type QueueDepth,
  type Task,
  type TaskMessage,
  type TaskQueue,
  type TaskType,
} from './base.js';

// KEYS: ready zset, dead zset
// ARGV: now ms, visibility timeout ms, task key prefix, scan size, accepted types...
const DEQUEUE = `
local now = tonumber(ARGV[1])
local ids = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', now, 'LIMIT', 0, tonumber(ARGV[4]))
local accepted = {}
for i = 5, #ARGV do accepted[ARGV[i]] = true end
for _, id in ipairs(ids) do
  local key = ARGV[3] .. id
  local raw = redis.call('GET', key)
  if not raw then
    redis.call('ZREM', KEYS[1], id)
  else
    local task = cjson.decode(raw)
    if accepted[task.type] then
      task.attempts = task.attempts + 1
      if task.attempts > task.maxRetries + 1 then
        if task.lastError == cjson.null then task.lastError = 'visibility timeout expired on every delivery' end
        redis.call('SET', key, cjson.encode(task))
        redis.call('ZREM', KEYS[1], id)
        redis.call('ZADD', KEYS[2], now, id)
      else
        task.visibleAt = now + tonumber(ARGV[2])
        local encoded = cjson.encode(task)
        redis.call('SET', key, encoded)
        redis.call('ZADD', KEYS[1], task.visibleAt, id)
        return encoded
      end
    end
  end
end
return false
`;

// KEYS: ready zset, dead zset, task key
// ARGV: now ms, delay ms, error
const NACK = `
local raw = redis.call('GET', KEYS[3])
if not raw then return 'dead' end
local task = cjson.decode(raw)
task.lastError = ARGV[3]
local id = task.id
if task.attempts > task.maxRetries then
  redis.call('SET', KEYS[3], cjson.encode(task))
  redis.call('ZREM', KEYS[1], id)
  redis.call('ZADD', KEYS[2], tonumber(ARGV[1]), id)
  return 'dead'
end
task.visibleAt = tonumber(ARGV[1]) + tonumber(ARGV[2])
redis.call('SET', KEYS[3], cjson.encode(task))
redis.call('ZADD', KEYS[1], task.visibleAt, id)
return 'requeued'
`;

const DEQUEUE_SCAN_SIZE = 50;

/**
 * Task queue on Redis: a sorted set of task ids scored by the time each
 * becomes visible, with the task body stored beside it. Dequeue and nack run
 * as Lua scripts so a task is handed to one consumer at a time.
 */
export class RedisTaskQueue implements TaskQueue {
  private nextId = monotonicFactory();

  constructor(private client: UpstashClient, private prefix = '') {}

  private readyKey(): string {
    return `${this.prefix}tasks:ready`;
  }

  private deadKey(): string {
    return `${this.prefix}tasks:dead`;
  }

  private taskKeyPrefix(): string {
    return `${this.prefix}task:`;
  }

  private taskKey(id: string): string {
    return `${this.taskKeyPrefix()}${id}`;
  }

  // Times are stored as epoch milliseconds so the scripts can compare them
  private serializeTask(task: Task): string {
    return JSON.stringify({
      ...task,
      visibleAt: task.visibleAt.getTime(),
      enqueuedAt: task.enqueuedAt.getTime(),
    });
  }

  private deserializeTask(data: string): Task {
    return TaskSchema.parse(JSON.parse(data));
  }

  async enqueue(message: TaskMessage, options: EnqueueOptions = {}): Promise<Task> {
    const now = new Date();
    const task: Task = {
      ...message,
      id: this.nextId(),
      attempts: 0,
      maxRetries: options.maxRetries ?? DEFAULT_TASK_MAX_RETRIES,
      visibleAt: new Date(now.getTime() + (options.delayMs ?? 0)),
      enqueuedAt: now,
      lastError: null,
    };

    await this.client.command(['SET', this.taskKey(task.id), this.serializeTask(task)]);
    await this.client.command(['ZADD', this.readyKey(), task.visibleAt.getTime(), task.id]);
    return task;
  }

  async dequeue(types: readonly TaskType[], options: { visibilityTimeoutMs: number }): Promise<Task | null> {
    const result = await this.client.eval(
      DEQUEUE,
      [this.readyKey(), this.deadKey()],
      [Date.now(), options.visibilityTimeoutMs, this.taskKeyPrefix(), DEQUEUE_SCAN_SIZE, ...types]
    );
    return typeof result === 'string' ? this.deserializeTask(result) : null;
  }

  async ack(taskId: string): Promise<void> {
    await this.client.command(['ZREM', this.readyKey(), taskId]);
    await this.client.command(['DEL', this.taskKey(taskId)]);
  }

  async nack(taskId: string, options: { delayMs: number; error: string }): Promise<NackResult> {
    const result = await this.client.eval(
      NACK,
      [this.readyKey(), this.deadKey(), this.taskKey(taskId)],
      [Date.now(), options.delayMs, options.error]
    );
    return result === 'requeued' ? 'requeued' : 'dead';
  }

  async listDeadLetters(limit = 100): Promise<Task[]> {
    const ids = await this.client.strings(['ZRANGE', this.deadKey(), 0, limit - 1]);
    if (ids.length === 0) return [];
    const data = await this.client.nullableStrings(['MGET', ...ids.map((id) => this.taskKey(id))]);
    return data
      .filter((item): item is string => item !== null)
      .map((item) => this.deserializeTask(item));
  }

  async requeueDeadLetter(taskId: string): Promise<Task | null> {
    const removed = await this.client.number(['ZREM', this.deadKey(), taskId]);
    if (removed === 0) return null;

    const data = await this.client.string(['GET', this.taskKey(taskId)]);
    if (!data) return null;

    const task: Task = { ...this.deserializeTask(data), attempts: 0, visibleAt: new Date() };
    await this.client.command(['SET', this.taskKey(taskId), this.serializeTask(task)]);
    await this.client.command(['ZADD', this.readyKey(), task.visibleAt.getTime(), taskId]);
    return task;
  }

  async depth(): Promise<QueueDepth> {
    const now = Date.now();
    const [ready, total, dead] = await Promise.all([
      this.client.number(['ZCOUNT', this.readyKey(), '-inf', now]),
      this.client.number(['ZCARD', this.readyKey()]),
      this.client.number(['ZCARD', this.deadKey()]),
    ]);
    return { ready, inFlight: total - ready, dead };
  }
}
