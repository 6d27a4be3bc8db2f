import path from 'node:path';
import type { AppConfig } from './config.js';
import type { Logger } from './logger.js';
import { BatchCoordinator } from './batch/coordinator.js';
import { TenantCache, createCacheBackend } from './cache/index.js';
import { CachedKnowledgeSource } from './content/knowledge.js';
import { InMemoryContentRepository, RedisContentRepository, type ContentRepository } from './content/repository.js';
import { exponentialBackoff } from './lib/backoff.js';
import { UpstashClient } from './lib/upstash.js';
import { Maintenance } from './maintenance/index.js';
import { NotificationFanout } from './notifications/fanout.js';
import {
  InMemoryNotificationPublisher,
  RedisNotificationPublisher,
  type NotificationPublisher,
} from './notifications/publisher.js';
import {
  InMemoryNotificationRepository,
  RedisNotificationRepository,
  type NotificationRepository,
} from './notifications/repository.js';
import {
  HttpAIProvider,
  UnconfiguredAIProvider,
  createJobHandlers,
  type AIProvider,
} from './orchestrator/index.js';
import { PROVISION_TASK, createTaskQueue, type TaskQueue } from './queue/index.js';
import {
  InMemoryRegistrationRepository,
  RedisRegistrationRepository,
  type RegistrationRepository,
} from './registrations/repository.js';
import { createJobStore, type JobStore } from './repositories/index.js';
import { JobService } from './services/job-service.js';
import { LocalObjectStorage, type ObjectStorage } from './storage/object-storage.js';
import { CheckoutEventTrigger } from './webhooks/checkout.js';
import { ProvisionTaskHandler } from './webhooks/provision.js';
import {
  HttpAccountProvisioner,
  UnconfiguredAccountProvisioner,
  type AccountProvisioner,
} from './webhooks/provisioner.js';
import { WorkerPool } from './worker/index.js';

export interface Container {
  config: AppConfig;
  logger: Logger;
  store: JobStore;
  queue: TaskQueue;
  notifications: NotificationRepository;
  notifier: NotificationFanout;
  registrations: RegistrationRepository;
  content: ContentRepository;
  batch: BatchCoordinator;
  jobs: JobService;
  trigger: CheckoutEventTrigger;
  worker: WorkerPool;
  maintenance: Maintenance;
}

/** Collaborators tests and embedders swap out. */
export interface ContainerOverrides {
  ai?: AIProvider;
  provisioner?: AccountProvisioner;
  storage?: ObjectStorage;
  publisher?: NotificationPublisher;
}

function createAIProvider(config: AppConfig): AIProvider {
  const { url, key, timeoutMs } = config.aiProvider;
  return url ? new HttpAIProvider({ url, key, timeoutMs }) : new UnconfiguredAIProvider();
}

function createProvisioner(config: AppConfig): AccountProvisioner {
  const { url, key } = config.provisioning;
  return url ? new HttpAccountProvisioner({ url, key }) : new UnconfiguredAccountProvisioner();
}

function createClient(config: AppConfig): UpstashClient | null {
  const { kind, redisUrl, redisToken } = config.store;
  if (kind !== 'redis' || !redisUrl || !redisToken) return null;
  return new UpstashClient(redisUrl, redisToken);
}

/** Wires every component for one process from its configuration. */
export function createContainer(config: AppConfig, logger: Logger, overrides: ContainerOverrides = {}): Container {
  const client = createClient(config);
  const backoff = exponentialBackoff(config.retry);

  const store = createJobStore({ client, backoff });
  const queue = createTaskQueue(client);
  const cache = new TenantCache(createCacheBackend(client), {
    defaultTtlSeconds: config.cacheTtlSeconds,
    logger,
  });
  const notifications = client ? new RedisNotificationRepository(client) : new InMemoryNotificationRepository();
  const publisher = overrides.publisher
    ?? (client ? new RedisNotificationPublisher(client) : new InMemoryNotificationPublisher());
  const registrations = client ? new RedisRegistrationRepository(client) : new InMemoryRegistrationRepository();
  const content = client ? new RedisContentRepository(client) : new InMemoryContentRepository();
  const storage = overrides.storage ?? new LocalObjectStorage(path.resolve(config.store.resultsDir));

  const notifier = new NotificationFanout(notifications, publisher, logger);
  const batch = new BatchCoordinator({ store, queue, notifier, policy: config.batchPolicy, logger });
  const jobs = new JobService({ store, queue, batch, logger });
  const trigger = new CheckoutEventTrigger(registrations, queue, logger);

  const handlers = createJobHandlers({
    ai: overrides.ai ?? createAIProvider(config),
    knowledge: new CachedKnowledgeSource(content, cache),
    content,
    storage,
  });
  const worker = new WorkerPool(
    {
      store,
      queue,
      handlers,
      taskHandlers: {
        [PROVISION_TASK]: new ProvisionTaskHandler(registrations, overrides.provisioner ?? createProvisioner(config)),
      },
      batch,
      notifier,
      taskBackoff: backoff,
      logger,
    },
    {
      concurrency: config.worker.concurrency,
      pollIntervalMs: config.worker.pollIntervalMs,
      visibilityTimeoutMs: config.worker.visibilityTimeoutMs,
    }
  );
  const maintenance = new Maintenance({
    store,
    queue,
    registrations,
    batch,
    notifier,
    logger,
    intervalMs: config.maintenance.intervalMs,
    staleJobTimeoutMs: config.maintenance.staleJobTimeoutMs,
  });

  return {
    config,
    logger,
    store,
    queue,
    notifications,
    notifier,
    registrations,
    content,
    batch,
    jobs,
    trigger,
    worker,
    maintenance,
  };
}
