import { ConflictError, ValidationError } from '../errors.js';
import type { UpstashClient } from '../lib/upstash.js';
import {
  CreateRegistrationSchema,
  PendingRegistrationSchema,
  REGISTRATION_TTL_MS,
  type CreateRegistrationData,
  type PendingRegistration,
  type RegistrationPatch,
  type RegistrationStatus,
} from './types.js';

export interface RegistrationRepository {
  create(data: CreateRegistrationData, now?: Date): Promise<PendingRegistration>;
  get(checkoutSessionId: string): Promise<PendingRegistration | null>;

  /** Moves `from` -> `to` only if the stored status is still `from`; null when the guard fails. */
  compareAndSet(
    checkoutSessionId: string,
    from: RegistrationStatus,
    to: RegistrationStatus,
    patch?: RegistrationPatch,
    now?: Date
  ): Promise<PendingRegistration | null>;

  delete(checkoutSessionId: string): Promise<void>;
  listByStatus(status: RegistrationStatus): Promise<PendingRegistration[]>;

  /** Deletes pending registrations whose checkout window has passed. */
  deleteExpired(now: Date): Promise<number>;
}

function newRegistration(data: CreateRegistrationData, now: Date): PendingRegistration {
  const parsed = CreateRegistrationSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError('Invalid registration', { issues: parsed.error.issues });
  }
  return {
    ...parsed.data,
    status: 'pending',
    createdAt: now,
    updatedAt: now,
    expiresAt: new Date(now.getTime() + REGISTRATION_TTL_MS),
    paidAt: null,
    errorMessage: null,
  };
}

export class InMemoryRegistrationRepository implements RegistrationRepository {
  private registrations = new Map<string, PendingRegistration>();

  async create(data: CreateRegistrationData, now: Date = new Date()): Promise<PendingRegistration> {
    const registration = newRegistration(data, now);
    if (this.registrations.has(registration.checkoutSessionId)) {
      throw new ConflictError(`Registration already exists: ${registration.checkoutSessionId}`);
    }
    this.registrations.set(registration.checkoutSessionId, registration);
    return registration;
  }

  async get(checkoutSessionId: string): Promise<PendingRegistration | null> {
    return this.registrations.get(checkoutSessionId) ?? null;
  }

  async compareAndSet(
    checkoutSessionId: string,
    from: RegistrationStatus,
    to: RegistrationStatus,
    patch: RegistrationPatch = {},
    now: Date = new Date()
  ): Promise<PendingRegistration | null> {
    const current = this.registrations.get(checkoutSessionId);
    if (!current || current.status !== from) return null;

    const updated: PendingRegistration = { ...current, ...patch, status: to, updatedAt: now };
    this.registrations.set(checkoutSessionId, updated);
    return updated;
  }

  async delete(checkoutSessionId: string): Promise<void> {
    this.registrations.delete(checkoutSessionId);
  }

  async listByStatus(status: RegistrationStatus): Promise<PendingRegistration[]> {
    return Array.from(this.registrations.values()).filter((registration) => registration.status === status);
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const registration of this.registrations.values()) {
      if (registration.status === 'pending' && registration.expiresAt.getTime() <= now.getTime()) {
        this.registrations.delete(registration.checkoutSessionId);
        removed++;
      }
    }
    return removed;
  }
}

// KEYS: registration key, from-status set, to-status set
// ARGV: expected status, serialized registration, checkout session id
const COMPARE_AND_SET = `
local current = redis.call('GET', KEYS[1])
if not current then return 0 end
local registration = cjson.decode(current)
if registration.status ~= ARGV[1] then return 0 end
redis.call('SET', KEYS[1], ARGV[2])
redis.call('SREM', KEYS[2], ARGV[3])
redis.call('SADD', KEYS[3], ARGV[3])
return 1
`;

/** Registrations keyed by checkout session id, with one set per status. */
export class RedisRegistrationRepository implements RegistrationRepository {
  constructor(private client: UpstashClient, private prefix = '') {}

  private registrationKey(checkoutSessionId: string): string {
    return `${this.prefix}registration:${checkoutSessionId}`;
  }

  private statusKey(status: RegistrationStatus): string {
    return `${this.prefix}registrations:status:${status}`;
  }

  private serialize(registration: PendingRegistration): string {
    return JSON.stringify({
      ...registration,
      createdAt: registration.createdAt.toISOString(),
      updatedAt: registration.updatedAt.toISOString(),
      expiresAt: registration.expiresAt.toISOString(),
      paidAt: registration.paidAt?.toISOString() ?? null,
    });
  }

  async create(data: CreateRegistrationData, now: Date = new Date()): Promise<PendingRegistration> {
    const registration = newRegistration(data, now);
    const created = await this.client.command([
      'SET', this.registrationKey(registration.checkoutSessionId), this.serialize(registration), 'NX',
    ]);
    if (created === null) {
      throw new ConflictError(`Registration already exists: ${registration.checkoutSessionId}`);
    }
    await this.client.command(['SADD', this.statusKey('pending'), registration.checkoutSessionId]);
    return registration;
  }

  async get(checkoutSessionId: string): Promise<PendingRegistration | null> {
    const data = await this.client.string(['GET', this.registrationKey(checkoutSessionId)]);
    return data ? PendingRegistrationSchema.parse(JSON.parse(data)) : null;
  }

  async compareAndSet(
    checkoutSessionId: string,
    from: RegistrationStatus,
    to: RegistrationStatus,
    patch: RegistrationPatch = {},
    now: Date = new Date()
  ): Promise<PendingRegistration | null> {
    const current = await this.get(checkoutSessionId);
    if (!current || current.status !== from) return null;

    const updated: PendingRegistration = { ...current, ...patch, status: to, updatedAt: now };
    const result = await this.client.eval(
      COMPARE_AND_SET,
      [this.registrationKey(checkoutSessionId), this.statusKey(from), this.statusKey(to)],
      [from, this.serialize(updated), checkoutSessionId]
    );
    return result === 1 ? updated : null;
  }

  async delete(checkoutSessionId: string): Promise<void> {
    const current = await this.get(checkoutSessionId);
    await this.client.command(['DEL', this.registrationKey(checkoutSessionId)]);
    if (current) {
      await this.client.command(['SREM', this.statusKey(current.status), checkoutSessionId]);
    }
  }

  async listByStatus(status: RegistrationStatus): Promise<PendingRegistration[]> {
    const ids = await this.client.strings(['SMEMBERS', this.statusKey(status)]);
    if (ids.length === 0) return [];
    const data = await this.client.nullableStrings(['MGET', ...ids.map((id) => this.registrationKey(id))]);
    return data
      .filter((item): item is string => item !== null)
      .map((item) => PendingRegistrationSchema.parse(JSON.parse(item)))
      .filter((registration) => registration.status === status);
  }

  async deleteExpired(now: Date): Promise<number> {
    let removed = 0;
    for (const registration of await this.listByStatus('pending')) {
      if (registration.expiresAt.getTime() <= now.getTime()) {
        await this.delete(registration.checkoutSessionId);
        removed++;
      }
    }
    return removed;
  }
}
