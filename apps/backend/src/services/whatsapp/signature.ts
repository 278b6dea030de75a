import { createHmac, timingSafeEqual } from 'crypto';

const SIGNATURE_PREFIX = 'sha256=';

export function signPayload(rawBody: Buffer, appSecret: string): string {
  return SIGNATURE_PREFIX + createHmac('sha256', appSecret).update(rawBody).digest('hex');
}

/** Checks an `X-Hub-Signature-256` header against the raw request body. */
export function verifySignature(rawBody: Buffer, header: string | undefined, appSecret: string): boolean {
  if (!header || !header.startsWith(SIGNATURE_PREFIX)) {
    return false;
  }

  const expected = Buffer.from(signPayload(rawBody, appSecret));
  const received = Buffer.from(header);

  return expected.length === received.length && timingSafeEqual(expected, received);
}
