import { createHmac, timingSafeEqual } from 'node:crypto';

/** Hex-encoded HMAC-SHA256 of `body` keyed with `secret`. */
export function computeSignature(body: Buffer | string, secret: string): string {
  return createHmac('sha256', secret).update(body).digest('hex');
}

/**
 * Verifies a webhook signature against the shared secret.
 *
 * An empty secret disables verification and every payload is accepted.
 * This is a deployment choice; startup logs a warning when it is in effect.
 *
 * Comparison is constant-time over equal-length inputs. A length mismatch
 * is rejected before comparing, which reveals only the expected length.
 */
export function verifySignature(
  body: Buffer | string,
  suppliedSignature: string,
  secret: string,
): boolean {
  if (secret === '') return true;

  const expected = Buffer.from(computeSignature(body, secret));
  const supplied = Buffer.from(suppliedSignature);
  if (expected.length !== supplied.length) return false;

  return timingSafeEqual(expected, supplied);
}
