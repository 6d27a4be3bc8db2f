import { z } from 'zod';
import { PermanentProviderError, TransientProviderError } from '../errors.js';
import { postJson } from '../lib/http.js';
import type { PendingRegistration } from '../registrations/types.js';

export interface ProvisionedAccount {
  companyId: string;
}

/** Creates the tenant, admin user and subscription for a paid checkout. */
export interface AccountProvisioner {
  provision(registration: PendingRegistration): Promise<ProvisionedAccount>;
}

const ProvisionedAccountSchema = z.object({ companyId: z.string().min(1) });

const PROVISIONING_TIMEOUT_MS = 30_000;

export class HttpAccountProvisioner implements AccountProvisioner {
  constructor(private options: { url: string; key?: string }) {}

  async provision(registration: PendingRegistration): Promise<ProvisionedAccount> {
    const body = await postJson(
      'provisioning',
      this.options.url,
      {
        checkoutSessionId: registration.checkoutSessionId,
        companyName: registration.companyName,
        adminEmail: registration.adminEmail,
        planId: registration.planId,
      },
      { token: this.options.key, timeoutMs: PROVISIONING_TIMEOUT_MS }
    );
    const parsed = ProvisionedAccountSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransientProviderError('provisioning', 'response is malformed');
    }
    return parsed.data;
  }
}

export class UnconfiguredAccountProvisioner implements AccountProvisioner {
  async provision(): Promise<ProvisionedAccount> {
    throw new PermanentProviderError('provisioning', 'PROVISIONING_URL is not configured');
  }
}
