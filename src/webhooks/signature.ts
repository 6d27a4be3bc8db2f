import { createHmac, timingSafeEqual } from 'node:crypto';
import { SignatureVerificationError } from '../errors.js';

export const SIGNATURE_HEADER = 'checkout-signature';

export function computeSignature(payload: string, secret: string, timestamp: number): string {
  return createHmac('sha256', secret).update(`${timestamp}.${payload}`).digest('hex');
}

/** Header value for `payload` signed at `timestamp` (unix seconds). */
export function signPayload(payload: string, secret: string, timestamp: number): string {
  return `t=${timestamp},v1=${computeSignature(payload, secret, timestamp)}`;
}

function parseHeader(header: string): { timestamp: number; signatures: string[] } {
  let timestamp = Number.NaN;
  const signatures: string[] = [];
  for (const part of header.split(',')) {
    const [key, value] = part.trim().split('=', 2);
    if (key === 't' && value) timestamp = Number(value);
    if (key === 'v1' && value) signatures.push(value);
  }
  return { timestamp, signatures };
}

/**
 * Checks a `t=<unix>,v1=<hex>` header against the raw request body. Any
 * mismatch, a missing header or a timestamp outside the tolerance window
 * throws SignatureVerificationError.
 */
export function verifySignature(
  payload: string,
  header: string | undefined,
  options: { secret: string; toleranceSeconds: number; now?: Date }
): void {
  if (!header) {
    throw new SignatureVerificationError('Missing signature header');
  }

  const { timestamp, signatures } = parseHeader(header);
  if (!Number.isInteger(timestamp) || signatures.length === 0) {
    throw new SignatureVerificationError('Malformed signature header');
  }

  const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
  if (Math.abs(nowSeconds - timestamp) > options.toleranceSeconds) {
    throw new SignatureVerificationError('Signature timestamp outside tolerance');
  }

  const expected = Buffer.from(computeSignature(payload, options.secret, timestamp), 'hex');
  const matches = signatures.some((signature) => {
    const candidate = Buffer.from(signature, 'hex');
    return candidate.length === expected.length && timingSafeEqual(candidate, expected);
  });
  if (!matches) {
    throw new SignatureVerificationError('Signature mismatch');
  }
}
