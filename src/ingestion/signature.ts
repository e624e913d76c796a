import { createHmac, timingSafeEqual } from 'node:crypto';

/** Constant-time string comparison; differing lengths fail before comparing. */
export function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a, 'utf8');
  const right = Buffer.from(b, 'utf8');
  return left.length === right.length && timingSafeEqual(left, right);
}

export function hmacSha256Hex(secret: string, rawBody: Buffer): string {
  return createHmac('sha256', secret).update(rawBody).digest('hex');
}

/**
 * HMAC-SHA256 over the exact request bytes, hex encoded, behind an optional
 * prefix (GitHub sends `sha256=<hex>`, Bitbucket the bare hex).
 */
export function verifyHmacSignature(
  rawBody: Buffer,
  credential: string | undefined,
  secret: string,
  prefix = '',
): boolean {
  if (!credential || !secret) return false;
  if (!credential.startsWith(prefix)) return false;
  return safeEqual(hmacSha256Hex(secret, rawBody), credential.slice(prefix.length));
}

/** Static shared token (GitLab). */
export function verifyToken(credential: string | undefined, secret: string): boolean {
  if (!credential || !secret) return false;
  return safeEqual(credential, secret);
}
