import type { FastifyRequest } from 'fastify';
import { z } from 'zod';
import { UnauthorizedError, ValidationError } from '../errors.js';
import type { TenantContext } from '../types/job.js';
import { headerValue } from './headers.js';

export const TENANT_HEADER = 'x-tenant-id';
export const USER_HEADER = 'x-user-id';

/** Tenant and user ids become storage key segments, so `:` and `/` are refused. */
const IdentifierSchema = z.string().regex(/^[A-Za-z0-9][A-Za-z0-9._@-]{0,127}$/);

const TenantContextSchema = z.object({ tenantId: IdentifierSchema, userId: IdentifierSchema });

declare module 'fastify' {
  interface FastifyRequest {
    tenant: TenantContext | null;
  }
}

export async function requireTenant(request: FastifyRequest): Promise<void> {
  const tenantId = headerValue(request, TENANT_HEADER);
  const userId = headerValue(request, USER_HEADER);
  if (!tenantId || !userId) {
    throw new UnauthorizedError(`${TENANT_HEADER} and ${USER_HEADER} headers are required`);
  }
  const parsed = TenantContextSchema.safeParse({ tenantId, userId });
  if (!parsed.success) {
    throw new ValidationError(`${TENANT_HEADER} and ${USER_HEADER} must be 1-128 letters, digits, ".", "_", "@" or "-"`, {
      issues: parsed.error.issues,
    });
  }
  request.tenant = parsed.data;
}

export function tenantOf(request: FastifyRequest): TenantContext {
  if (!request.tenant) {
    throw new UnauthorizedError(`${TENANT_HEADER} and ${USER_HEADER} headers are required`);
  }
  return request.tenant;
}
