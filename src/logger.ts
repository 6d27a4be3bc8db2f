import { pino, type Logger } from 'pino';

export type { Logger };

export function createLogger(options: { level: string }): Logger {
  return pino({
    level: options.level,
    base: { service: 'generation-jobs' },
    redact: [
      'req.headers.authorization',
      'req.headers["x-api-key"]',
      'req.headers["checkout-signature"]',
      'apiKey',
      'token',
    ],
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/** Logger for tests and tools that must stay quiet. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
