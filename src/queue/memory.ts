import { monotonicFactory } from 'ulid';
import {
  DEFAULT_TASK_MAX_RETRIES,
  type EnqueueOptions,
  type NackResult,
  type QueueDepth,
  type Task,
  type TaskMessage,
  type TaskQueue,
  type TaskType,
} from './base.js';

export class InMemoryTaskQueue implements TaskQueue {
  private tasks = new Map<string, Task>();
  private dead = new Map<string, Task>();
  private nextId = monotonicFactory();

  constructor(private now: () => Date = () => new Date()) {}

  async enqueue(message: TaskMessage, options: EnqueueOptions = {}): Promise<Task> {
    const now = this.now();
    const task: Task = {
      ...message,
      id: this.nextId(),
      attempts: 0,
      maxRetries: options.maxRetries ?? DEFAULT_TASK_MAX_RETRIES,
      visibleAt: new Date(now.getTime() + (options.delayMs ?? 0)),
      enqueuedAt: now,
      lastError: null,
    };
    this.tasks.set(task.id, task);
    return task;
  }

  async dequeue(types: readonly TaskType[], options: { visibilityTimeoutMs: number }): Promise<Task | null> {
    const now = this.now();
    const ready = Array.from(this.tasks.values())
      .filter(task => types.includes(task.type) && task.visibleAt.getTime() <= now.getTime())
      .sort((a, b) => a.visibleAt.getTime() - b.visibleAt.getTime() || (a.id < b.id ? -1 : 1));

    for (const task of ready) {
      const attempts = task.attempts + 1;
      // Delivered and timed out too often without an ack or nack
      if (attempts > task.maxRetries + 1) {
        this.bury({ ...task, lastError: task.lastError ?? 'visibility timeout expired on every delivery' });
        continue;
      }

      const delivered: Task = {
        ...task,
        attempts,
        visibleAt: new Date(now.getTime() + options.visibilityTimeoutMs),
      };
      this.tasks.set(task.id, delivered);
      return delivered;
    }
    return null;
  }

  async ack(taskId: string): Promise<void> {
    this.tasks.delete(taskId);
  }

  async nack(taskId: string, options: { delayMs: number; error: string }): Promise<NackResult> {
    const task = this.tasks.get(taskId);
    if (!task) return 'dead';

    if (task.attempts > task.maxRetries) {
      this.bury({ ...task, lastError: options.error });
      return 'dead';
    }

    this.tasks.set(taskId, {
      ...task,
      lastError: options.error,
      visibleAt: new Date(this.now().getTime() + options.delayMs),
    });
    return 'requeued';
  }

  async listDeadLetters(limit = 100): Promise<Task[]> {
    return Array.from(this.dead.values()).slice(0, limit);
  }

  async requeueDeadLetter(taskId: string): Promise<Task | null> {
    const task = this.dead.get(taskId);
    if (!task) return null;

    const requeued: Task = { ...task, attempts: 0, visibleAt: this.now() };
    this.dead.delete(taskId);
    this.tasks.set(taskId, requeued);
    return requeued;
  }

  async depth(): Promise<QueueDepth> {
    const now = this.now().getTime();
    let ready = 0;
    let inFlight = 0;
    for (const task of this.tasks.values()) {
      if (task.attempts > 0 && task.visibleAt.getTime() > now) inFlight++;
      else ready++;
    }
    return { ready, inFlight, dead: this.dead.size };
  }

  private bury(task: Task): void {
    this.tasks.delete(task.id);
    this.dead.set(task.id, task);
  }
}
