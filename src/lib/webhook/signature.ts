import { createHmac, timingSafeEqual } from 'crypto';

export const SIGNATURE_HEADER = 'x-hub-signature-256';

/**
 * `sha256=<hex HMAC of the raw body>`
 */
export function computeSignature(secret: string, body: Buffer): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

/**
 * Constant-time check of a signature header against the raw body
 */
export function verifySignature(
  secret: string,
  body: Buffer,
  header: string | undefined,
): boolean {
  if (header === undefined) {
    return false;
  }

  const expected = Buffer.from(computeSignature(secret, body));
  const received = Buffer.from(header);

  if (expected.length !== received.length) {
    return false;
  }

  return timingSafeEqual(expected, received);
}
