import { z } from 'zod';

export const REGISTRATION_STATUSES = ['pending', 'paid', 'provisioning', 'failed'] as const;
export type RegistrationStatus = typeof REGISTRATION_STATUSES[number];

/** Expiry window for a checkout that is never paid. */
export const REGISTRATION_TTL_MS = 24 * 60 * 60 * 1000;

export interface PendingRegistration {
  checkoutSessionId: string;
  companyName: string;
  adminEmail: string;
  planId: string;
  status: RegistrationStatus;
  createdAt: Date;
  updatedAt: Date;
  expiresAt: Date;
  paidAt: Date | null;
  errorMessage: string | null;
}

export const CreateRegistrationSchema = z.object({
  checkoutSessionId: z.string().min(1),
  companyName: z.string().min(1).max(200),
  adminEmail: z.string().email(),
  planId: z.string().min(1),
});

export type CreateRegistrationData = z.infer<typeof CreateRegistrationSchema>;

export const PendingRegistrationSchema = CreateRegistrationSchema.extend({
  status: z.enum(REGISTRATION_STATUSES),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
  expiresAt: z.coerce.date(),
  paidAt: z.coerce.date().nullable(),
  errorMessage: z.string().nullable(),
});

export type RegistrationPatch = Partial<Pick<PendingRegistration, 'paidAt' | 'errorMessage'>>;
