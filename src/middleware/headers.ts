import type { FastifyRequest } from 'fastify';

/** A single non-empty header value; repeated or blank headers read as absent. */
export function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}
