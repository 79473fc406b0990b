import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'x-sync-signature';
const SIGNATURE_PREFIX = 'sha256=';

export function signPayload(payload: Buffer | string, secret: string): string {
  const digest = createHmac('sha256', secret).update(payload).digest('hex');
  return `${SIGNATURE_PREFIX}${digest}`;
}

/** Constant-time comparison of `header` against the HMAC of `payload`. */
export function verifySignature(
  payload: Buffer | string,
  header: string | undefined,
  secret: string,
): boolean {
  if (!header?.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }
  const expected = Buffer.from(signPayload(payload, secret), 'utf8');
  const received = Buffer.from(header, 'utf8');
  return (
    expected.length === received.length && timingSafeEqual(expected, received)
  );
}
