import { z } from 'zod';
import type { Logger } from '../logger.js';
import { ValidationError, errorMessage } from '../errors.js';
import { PROVISION_TASK, type TaskQueue } from '../queue/base.js';
import type { RegistrationRepository } from '../registrations/repository.js';

export const CHECKOUT_COMPLETED = 'checkout.session.completed';

/** Budget for provisioning redeliveries before the task is dead-lettered. */
export const PROVISION_TASK_MAX_RETRIES = 10;

export const CheckoutEventSchema = z.object({
  id: z.string().min(1),
  type: z.string().min(1),
  data: z.object({
    object: z.object({
      id: z.string().min(1),
    }).passthrough(),
  }),
});

export type CheckoutEvent = z.infer<typeof CheckoutEventSchema>;

export type TriggerOutcome = 'accepted' | 'duplicate' | 'ignored' | 'unknown_session';

export function parseCheckoutEvent(payload: string): CheckoutEvent {
  let body: unknown;
  try {
    body = JSON.parse(payload);
  } catch {
    throw new ValidationError('Webhook payload is not valid JSON');
  }
  const parsed = CheckoutEventSchema.safeParse(body);
  if (!parsed.success) {
    throw new ValidationError('Unrecognised webhook payload', { issues: parsed.error.issues });
  }
  return parsed.data;
}

/**
 * Turns a verified checkout event into at most one provisioning task. The
 * `pending -> paid` compare-and-set is the guard: duplicate deliveries and
 * concurrent deliveries lose the CAS and do nothing.
 */
export class CheckoutEventTrigger {
  private logger: Logger;

  constructor(
    private registrations: RegistrationRepository,
    private queue: TaskQueue,
    logger: Logger,
    private now: () => Date = () => new Date()
  ) {
    this.logger = logger.child({ component: 'checkout-trigger' });
  }

  async handle(event: CheckoutEvent): Promise<TriggerOutcome> {
    const checkoutSessionId = event.data.object.id;
    const logger = this.logger.child({ eventId: event.id, checkoutSessionId });

    if (event.type !== CHECKOUT_COMPLETED) {
      logger.debug({ type: event.type }, 'Ignoring checkout event');
      return 'ignored';
    }

    const registration = await this.registrations.get(checkoutSessionId);
    if (!registration) {
      logger.warn('Checkout completed for an unknown session');
      return 'unknown_session';
    }
    if (registration.status !== 'pending') {
      logger.info({ status: registration.status }, 'Duplicate checkout event');
      return 'duplicate';
    }

    const now = this.now();
    const paid = await this.registrations.compareAndSet(checkoutSessionId, 'pending', 'paid', { paidAt: now }, now);
    if (!paid) {
      logger.info('Lost the payment transition to a concurrent delivery');
      return 'duplicate';
    }

    try {
      await this.queue.enqueue(
        { type: PROVISION_TASK, payload: { checkoutSessionId } },
        { maxRetries: PROVISION_TASK_MAX_RETRIES }
      );
    } catch (error) {
      // The registration stays paid; reconciliation re-enqueues it
      logger.error({ error: errorMessage(error) }, 'Failed to enqueue provisioning task');
    }
    logger.info('Checkout marked paid');
    return 'accepted';
  }
}
