import type { Logger } from '../logger.js';
import { errorMessage, isRetryable } from '../errors.js';
import { PROVISION_TASK, type Task } from '../queue/base.js';
import type { RegistrationRepository } from '../registrations/repository.js';
import type { TaskHandler } from '../worker/index.js';
import type { AccountProvisioner } from './provisioner.js';

/**
 * Runs a provisioning task. `paid -> provisioning` is claimed by CAS so two
 * deliveries of the same task cannot both provision. Transient failures put
 * the registration back to `paid` and rethrow for redelivery; permanent ones
 * mark it `failed`.
 */
export class ProvisionTaskHandler implements TaskHandler {
  constructor(
    private registrations: RegistrationRepository,
    private provisioner: AccountProvisioner,
    private now: () => Date = () => new Date()
  ) {}

  async handle(task: Task, logger: Logger): Promise<void> {
    if (task.type !== PROVISION_TASK) return;
    const { checkoutSessionId } = task.payload;

    const registration = await this.registrations.compareAndSet(checkoutSessionId, 'paid', 'provisioning', {}, this.now());
    if (!registration) {
      logger.info({ checkoutSessionId }, 'Registration not awaiting provisioning; skipping');
      return;
    }

    try {
      const account = await this.provisioner.provision(registration);
      await this.registrations.delete(checkoutSessionId);
      logger.info({ checkoutSessionId, companyId: account.companyId }, 'Account provisioned');
    } catch (error) {
      if (isRetryable(error)) {
        await this.registrations.compareAndSet(checkoutSessionId, 'provisioning', 'paid', {}, this.now());
        throw error;
      }
      await this.registrations.compareAndSet(
        checkoutSessionId,
        'provisioning',
        'failed',
        { errorMessage: errorMessage(error) },
        this.now()
      );
      logger.error({ checkoutSessionId, error: errorMessage(error) }, 'Provisioning failed permanently');
    }
  }
}
