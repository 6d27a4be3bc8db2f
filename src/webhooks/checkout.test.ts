import { describe, it, expect, beforeEach } from 'vitest';
import { CheckoutEventTrigger, parseCheckoutEvent, type CheckoutEvent } from './checkout.js';
import { StorageError, ValidationError } from '../errors.js';
import { silentLogger } from '../logger.js';
import { InMemoryTaskQueue, type Task } from '../queue/index.js';
import { InMemoryRegistrationRepository } from '../registrations/repository.js';

const NOW = new Date('2026-05-01T12:00:00Z');

function completed(sessionId = 'cs_1', eventId = 'evt_1'): CheckoutEvent {
  return { id: eventId, type: 'checkout.session.completed', data: { object: { id: sessionId } } };
}

class UnavailableQueue extends InMemoryTaskQueue {
  async enqueue(): Promise<Task> {
    throw new StorageError('queue unavailable');
  }
}

describe('CheckoutEventTrigger', () => {
  let registrations: InMemoryRegistrationRepository;
  let queue: InMemoryTaskQueue;
  let trigger: CheckoutEventTrigger;

  beforeEach(async () => {
    registrations = new InMemoryRegistrationRepository();
    queue = new InMemoryTaskQueue();
    trigger = new CheckoutEventTrigger(registrations, queue, silentLogger(), () => NOW);
    await registrations.create(
      { checkoutSessionId: 'cs_1', companyName: 'Acme Training', adminEmail: 'admin@example.com', planId: 'team' },
      new Date('2026-05-01T11:00:00Z')
    );
  });

  it('should mark the registration paid and enqueue one provisioning task', async () => {
    await expect(trigger.handle(completed())).resolves.toBe('accepted');

    const registration = await registrations.get('cs_1');
    expect(registration?.status).toBe('paid');
    expect(registration?.paidAt).toEqual(NOW);

    const task = await queue.dequeue(['registration:provision'], { visibilityTimeoutMs: 1000 });
    expect(task?.payload).toEqual({ checkoutSessionId: 'cs_1' });
    expect(task?.maxRetries).toBe(10);
  });

  it('should enqueue exactly once when the same event is delivered twice', async () => {
    await trigger.handle(completed());
    await expect(trigger.handle(completed())).resolves.toBe('duplicate');

    expect(await queue.depth()).toEqual({ ready: 1, inFlight: 0, dead: 0 });
  });

  it('should let only one of two concurrent deliveries win', async () => {
    const outcomes = await Promise.all([trigger.handle(completed()), trigger.handle(completed('cs_1', 'evt_2'))]);

    expect(outcomes.sort()).toEqual(['accepted', 'duplicate']);
    expect((await queue.depth()).ready).toBe(1);
  });

  it('should ignore other event types', async () => {
    await expect(trigger.handle({ ...completed(), type: 'checkout.session.expired' })).resolves.toBe('ignored');
    expect((await registrations.get('cs_1'))?.status).toBe('pending');
  });

  it('should report unknown sessions without side effects', async () => {
    await expect(trigger.handle(completed('cs_missing'))).resolves.toBe('unknown_session');
    expect((await queue.depth()).ready).toBe(0);
  });

  it('should keep the paid transition when enqueueing fails', async () => {
    trigger = new CheckoutEventTrigger(registrations, new UnavailableQueue(), silentLogger(), () => NOW);

    await expect(trigger.handle(completed())).resolves.toBe('accepted');
    expect((await registrations.get('cs_1'))?.status).toBe('paid');
  });
});

describe('parseCheckoutEvent', () => {
  it('should parse a checkout event', () => {
    const event = parseCheckoutEvent(JSON.stringify({
      id: 'evt_1',
      type: 'checkout.session.completed',
      data: { object: { id: 'cs_1', amount_total: 4900 } },
    }));

    expect(event.data.object.id).toBe('cs_1');
  });

  it('should reject invalid JSON', () => {
    expect(() => parseCheckoutEvent('{not json')).toThrow('Webhook payload is not valid JSON');
  });

  it('should reject an event without a session id', () => {
    expect(() => parseCheckoutEvent('{"id":"evt_1","type":"checkout.session.completed","data":{}}')).toThrow(
      ValidationError
    );
  });
});
