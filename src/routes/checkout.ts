import type { FastifyPluginAsync } from 'fastify';
import { AppError, ValidationError } from '../errors.js';
import { headerValue } from '../middleware/headers.js';
import { validateBody } from '../middleware/validation.js';
import type { RegistrationRepository } from '../registrations/repository.js';
import { CreateRegistrationSchema } from '../registrations/types.js';
import { parseCheckoutEvent, type CheckoutEventTrigger } from '../webhooks/checkout.js';
import { SIGNATURE_HEADER, verifySignature } from '../webhooks/signature.js';

/** Records a pending registration when a checkout session is created. */
export function registrationRoutes(registrations: RegistrationRepository): FastifyPluginAsync {
  return async (app) => {
    app.post('/registrations', async (request, reply) => {
      const data = validateBody(CreateRegistrationSchema, request);
      const registration = await registrations.create(data);
      reply.code(201);
      return { registration };
    });
  };
}

export interface CheckoutWebhookOptions {
  trigger: CheckoutEventTrigger;
  secret: string | undefined;
  toleranceSeconds: number;
  now?: () => Date;
}

/**
 * The payment provider's callback. The signature covers the exact bytes sent,
 * so JSON bodies stay raw strings inside this plugin.
 */
export function checkoutWebhookRoutes(options: CheckoutWebhookOptions): FastifyPluginAsync {
  return async (app) => {
    app.addContentTypeParser('application/json', { parseAs: 'string' }, (_request, body, done) => {
      done(null, body);
    });

    app.post('/webhooks/checkout', async (request) => {
      if (!options.secret) {
        throw new AppError('Checkout webhooks are not configured', 'WEBHOOKS_DISABLED', 503);
      }
      if (typeof request.body !== 'string') {
        throw new ValidationError('Webhook body must be JSON');
      }

      verifySignature(request.body, headerValue(request, SIGNATURE_HEADER), {
        secret: options.secret,
        toleranceSeconds: options.toleranceSeconds,
        now: options.now?.(),
      });
      const event = parseCheckoutEvent(request.body);
      const outcome = await options.trigger.handle(event);
      return { received: true, outcome };
    });
  };
}
