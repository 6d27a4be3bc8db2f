import type { FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../errors.js';
import { headerValue } from './headers.js';

export const API_KEY_HEADER = 'x-api-key';

/** No key is required when none is configured. */
export function requireApiKey(expectedKey: string | undefined) {
  return async (request: FastifyRequest): Promise<void> => {
    if (!expectedKey) return;

    const apiKey = headerValue(request, API_KEY_HEADER);
    if (apiKey !== expectedKey) {
      throw new UnauthorizedError(`Valid ${API_KEY_HEADER} header required`);
    }
  };
}
