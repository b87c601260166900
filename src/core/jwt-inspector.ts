/**
 * JWT Inspector - reads issue/expiry times out of captured tokens
 *
 * Signatures are NOT verified here. The tokens are issued by the console to
 * our own browser session and only round-tripped for expiry bookkeeping; no
 * authorization decision is ever made from these claims. Anything that needs
 * to trust a claim must verify the signature against the issuer's keys.
 */

export interface JwtTiming {
  issuedAt?: Date;
  expiresAt?: Date;
  payload: Record<string, unknown>;
}

const SEGMENT = /^[A-Za-z0-9_-]+={0,2}$/;

/**
 * Decode one base64url segment, restoring the padding JWTs strip.
 */
export function decodeBase64UrlSegment(segment: string): string | null {
  if (!SEGMENT.test(segment)) {
    return null;
  }
  const unpadded = segment.replace(/=+$/, '');
  const remainder = unpadded.length % 4;
  if (remainder === 1) {
    return null;
  }
  const padded = remainder === 0 ? unpadded : unpadded + '='.repeat(4 - remainder);
  const base64 = padded.replace(/-/g, '+').replace(/_/g, '/');
  return Buffer.from(base64, 'base64').toString('utf8');
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function secondsToDate(value: unknown): Date | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  const date = new Date(value * 1000);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Decode a three-part token's payload. Returns null for anything that is not
 * a JWT with an object payload; never throws.
 */
export function inspectJwt(token: string): JwtTiming | null {
  const parts = token.trim().split('.');
  if (parts.length !== 3 || parts[1].length === 0) {
    return null;
  }

  const json = decodeBase64UrlSegment(parts[1]);
  if (json === null) {
    return null;
  }

  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch {
    return null;
  }
  if (!isPlainObject(payload)) {
    return null;
  }

  return {
    issuedAt: secondsToDate(payload.iat),
    expiresAt: secondsToDate(payload.exp),
    payload,
  };
}

/**
 * Milliseconds until expiry, negative once expired; null when the token carries no `exp`.
 */
export function remainingLifetimeMs(token: string, now: Date = new Date()): number | null {
  const timing = inspectJwt(token);
  if (!timing?.expiresAt) {
    return null;
  }
  return timing.expiresAt.getTime() - now.getTime();
}

/**
 * Shape check used by the interceptor: three dot-separated segments starting with a JSON header.
 */
export function looksLikeJwt(value: string): boolean {
  return value.startsWith('eyJ') && value.split('.').length === 3;
}
