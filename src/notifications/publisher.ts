import type { UpstashClient } from '../lib/upstash.js';
import type { NotificationEvent } from './types.js';

export interface NotificationPublisher {
  publish(channel: string, event: NotificationEvent): Promise<void>;
}

export class RedisNotificationPublisher implements NotificationPublisher {
  constructor(private client: UpstashClient) {}

  async publish(channel: string, event: NotificationEvent): Promise<void> {
    await this.client.command(['PUBLISH', channel, JSON.stringify(event)]);
  }
}

type Listener = (event: NotificationEvent) => void;

/** In-process pub/sub for a single node and for tests. */
export class InMemoryNotificationPublisher implements NotificationPublisher {
  private listeners = new Map<string, Set<Listener>>();

  async publish(channel: string, event: NotificationEvent): Promise<void> {
    for (const listener of this.listeners.get(channel) ?? []) {
      listener(event);
    }
  }

  subscribe(channel: string, listener: Listener): () => void {
    const listeners = this.listeners.get(channel) ?? new Set<Listener>();
    listeners.add(listener);
    this.listeners.set(channel, listeners);
    return () => {
      listeners.delete(listener);
      if (listeners.size === 0 && this.listeners.get(channel) === listeners) this.listeners.delete(channel);
    };
  }
}
