import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ProvisionTaskHandler } from './provision.js';
import type { AccountProvisioner } from './provisioner.js';
import { PermanentProviderError, TransientProviderError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { InMemoryTaskQueue, PROVISION_TASK, type Task } from '../queue/index.js';
import { InMemoryRegistrationRepository } from '../registrations/repository.js';

describe('ProvisionTaskHandler', () => {
  let registrations: InMemoryRegistrationRepository;
  let task: Task;
  const logger = silentLogger();

  beforeEach(async () => {
    registrations = new InMemoryRegistrationRepository();
    await registrations.create({
      checkoutSessionId: 'cs_1',
      companyName: 'Acme Training',
      adminEmail: 'admin@example.com',
      planId: 'team',
    });
    await registrations.compareAndSet('cs_1', 'pending', 'paid', { paidAt: new Date() });
    task = await new InMemoryTaskQueue().enqueue({ type: PROVISION_TASK, payload: { checkoutSessionId: 'cs_1' } });
  });

  function handlerWith(provision: AccountProvisioner['provision']): ProvisionTaskHandler {
    return new ProvisionTaskHandler(registrations, { provision });
  }

  it('should provision a paid registration and delete it', async () => {
    const provision = vi.fn(async () => ({ companyId: 'company-1' }));

    await handlerWith(provision).handle(task, logger);

    expect(provision).toHaveBeenCalledTimes(1);
    expect(await registrations.get('cs_1')).toBeNull();
  });

  it('should skip a registration that is not awaiting provisioning', async () => {
    const provision = vi.fn(async () => ({ companyId: 'company-1' }));
    const handler = handlerWith(provision);
    await handler.handle(task, logger);

    await handler.handle(task, logger);

    expect(provision).toHaveBeenCalledTimes(1);
  });

  it('should put the registration back to paid and rethrow a transient error', async () => {
    const handler = handlerWith(async () => {
      throw new TransientProviderError('provisioning', 'responded 503');
    });

    await expect(handler.handle(task, logger)).rejects.toBeInstanceOf(TransientProviderError);
    expect((await registrations.get('cs_1'))?.status).toBe('paid');
  });

  it('should mark the registration failed on a permanent error', async () => {
    const handler = handlerWith(async () => {
      throw new PermanentProviderError('provisioning', 'rejected request with 400');
    });

    await expect(handler.handle(task, logger)).resolves.toBeUndefined();

    const registration = await registrations.get('cs_1');
    expect(registration?.status).toBe('failed');
    expect(registration?.errorMessage).toBe('provisioning: rejected request with 400');
  });
});
