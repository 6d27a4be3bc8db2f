import { z } from 'zod';
import { StorageError } from '../errors.js';

const UpstashResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.string().optional(),
});

export type RedisArg = string | number;

/**
 * Minimal client for the Upstash Redis REST API. Each call POSTs one command
 * as a JSON array; scripts go through EVAL so multi-key transitions stay atomic
 * on the server.
 */
export class UpstashClient {
  private baseUrl: string;
  private token: string;

  constructor(url: string, token: string) {
    this.baseUrl = url.replace(/\/$/, '');
    this.token = token;
  }

  async command(command: RedisArg[]): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.token}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(command.map(String)),
      });
    } catch (error) {
      throw new StorageError('Redis request failed', { command: command[0], cause: String(error) });
    }

    if (!response.ok) {
      throw new StorageError(`Redis request failed: ${response.status} ${response.statusText}`, {
        command: command[0],
      });
    }

    const data = UpstashResponseSchema.parse(await response.json());
    if (data.error) {
      throw new StorageError(`Redis error: ${data.error}`, { command: command[0] });
    }

    return data.result ?? null;
  }

  async eval(script: string, keys: string[], args: RedisArg[]): Promise<unknown> {
    return this.command(['EVAL', script, keys.length, ...keys, ...args]);
  }

  async string(command: RedisArg[]): Promise<string | null> {
    const result = await this.command(command);
    return typeof result === 'string' ? result : null;
  }

  async strings(command: RedisArg[]): Promise<string[]> {
    const result = await this.command(command);
    if (!Array.isArray(result)) return [];
    return result.filter((item): item is string => typeof item === 'string');
  }

  /** MGET keeps positions, so missing keys come back as null. */
  async nullableStrings(command: RedisArg[]): Promise<(string | null)[]> {
    const result = await this.command(command);
    if (!Array.isArray(result)) return [];
    return result.map((item) => (typeof item === 'string' ? item : null));
  }

  async number(command: RedisArg[]): Promise<number> {
    const result = await this.command(command);
    return typeof result === 'number' ? result : Number(result ?? 0);
  }
}
