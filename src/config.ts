import { z } from 'zod';
import { ConfigError } from './errors.js';

const flag = z.enum(['0', '1']).transform((value) => value === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(4500),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  NODE_ENV: z.string().default('development'),
  CORS_DEV: flag.default('0'),

  STORE_KIND: z.enum(['memory', 'redis']).default('memory'),
  UPSTASH_REDIS_REST_URL: z.string().url().optional(),
  UPSTASH_REDIS_REST_TOKEN: z.string().min(1).optional(),
  RESULTS_DIR: z.string().default('./.data/objects'),

  WORKER_ENABLED: flag.default('1'),
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(4),
  WORKER_POLL_INTERVAL_MS: z.coerce.number().int().min(10).default(1000),
  QUEUE_VISIBILITY_TIMEOUT_MS: z.coerce.number().int().min(1000).default(600_000),
  SHUTDOWN_DEADLINE_MS: z.coerce.number().int().min(0).default(10_000),
  STALE_JOB_TIMEOUT_MINUTES: z.coerce.number().int().min(1).default(30),
  MAINTENANCE_INTERVAL_MS: z.coerce.number().int().min(1000).default(60_000),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(60_000),
  BATCH_FAILURE_POLICY: z.enum(['fail-fast', 'wait-all', 'best-effort']).default('fail-fast'),
  CACHE_TTL_SECONDS: z.coerce.number().int().min(1).default(300),

  JOBS_API_KEY: z.string().min(1).optional(),
  CHECKOUT_WEBHOOK_SECRET: z.string().min(1).optional(),
  RATE_LIMIT_ENABLED: flag.default('0'),
  ENQUEUE_BURST: z.coerce.number().int().min(1).default(60),
  ENQUEUE_SUSTAINED_PER_MIN: z.coerce.number().int().min(1).default(600),
  WEBHOOK_TOLERANCE_SECONDS: z.coerce.number().int().min(1).default(300),

  AI_PROVIDER_URL: z.string().url().optional(),
  AI_PROVIDER_KEY: z.string().min(1).optional(),
  AI_PROVIDER_TIMEOUT_MS: z.coerce.number().int().min(1000).default(120_000),
  PROVISIONING_URL: z.string().url().optional(),
  PROVISIONING_KEY: z.string().min(1).optional(),
});

export type AppConfig = ReturnType<typeof toConfig>;

function toConfig(env: z.infer<typeof EnvSchema>) {
  return {
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    production: env.NODE_ENV === 'production',
    corsDev: env.CORS_DEV,
    store: {
      kind: env.STORE_KIND,
      redisUrl: env.UPSTASH_REDIS_REST_URL,
      redisToken: env.UPSTASH_REDIS_REST_TOKEN,
      resultsDir: env.RESULTS_DIR,
    },
    worker: {
      enabled: env.WORKER_ENABLED,
      concurrency: env.WORKER_CONCURRENCY,
      pollIntervalMs: env.WORKER_POLL_INTERVAL_MS,
      visibilityTimeoutMs: env.QUEUE_VISIBILITY_TIMEOUT_MS,
      shutdownDeadlineMs: env.SHUTDOWN_DEADLINE_MS,
    },
    maintenance: {
      intervalMs: env.MAINTENANCE_INTERVAL_MS,
      staleJobTimeoutMs: env.STALE_JOB_TIMEOUT_MINUTES * 60_000,
    },
    retry: {
      baseDelayMs: env.RETRY_BASE_DELAY_MS,
      maxDelayMs: env.RETRY_MAX_DELAY_MS,
    },
    batchPolicy: env.BATCH_FAILURE_POLICY,
    cacheTtlSeconds: env.CACHE_TTL_SECONDS,
    apiKey: env.JOBS_API_KEY,
    rateLimit: {
      enabled: env.RATE_LIMIT_ENABLED,
      burst: env.ENQUEUE_BURST,
      sustainedPerMinute: env.ENQUEUE_SUSTAINED_PER_MIN,
    },
    webhook: {
      secret: env.CHECKOUT_WEBHOOK_SECRET,
      toleranceSeconds: env.WEBHOOK_TOLERANCE_SECONDS,
    },
    aiProvider: {
      url: env.AI_PROVIDER_URL,
      key: env.AI_PROVIDER_KEY,
      timeoutMs: env.AI_PROVIDER_TIMEOUT_MS,
    },
    provisioning: {
      url: env.PROVISIONING_URL,
      key: env.PROVISIONING_KEY,
    },
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.'));
    throw new ConfigError(`Invalid configuration: ${keys.join(', ')}`, {
      issues: parsed.error.issues,
    });
  }

  const config = toConfig(parsed.data);
  if (config.store.kind === 'redis' && (!config.store.redisUrl || !config.store.redisToken)) {
    throw new ConfigError('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when STORE_KIND=redis');
  }
  if (config.retry.maxDelayMs < config.retry.baseDelayMs) {
    throw new ConfigError('RETRY_MAX_DELAY_MS must not be lower than RETRY_BASE_DELAY_MS');
  }
  return config;
}
