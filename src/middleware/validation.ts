import type { FastifyRequest } from 'fastify';
import type { ZodType, ZodTypeDef } from 'zod';
import { ValidationError } from '../errors.js';

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

function parseWith<T>(schema: Schema<T>, value: unknown, message: string): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError(message, { issues: parsed.error.issues });
  }
  return parsed.data;
}

export function validateBody<T>(schema: Schema<T>, request: FastifyRequest): T {
  return parseWith(schema, request.body, 'Invalid request body');
}

export function validateQuery<T>(schema: Schema<T>, request: FastifyRequest): T {
  return parseWith(schema, request.query, 'Invalid query parameters');
}

export function validateParams<T>(schema: Schema<T>, request: FastifyRequest): T {
  return parseWith(schema, request.params, 'Invalid path parameters');
}
