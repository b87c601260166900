/**
 * Token Interceptor - passive tap on the page's outgoing request headers
 *
 * Attached before the first navigation so the very first authenticated
 * request is seen. Capture is first-seen-wins per token kind: once a kind
 * holds a value, later observations are ignored. The request callback is
 * synchronous and never touches the request it observes.
 *
 * When live interception saw nothing, scrapeStorage() reads the page's
 * localStorage/sessionStorage for known token shapes, including the
 * base64-wrapped JSON blob some consoles keep their auth state in.
 */

import type { CapturedToken, CapturedTokenSet, TokenKind, TokenSource } from '../types/provisioning.js';
import type { StorageSnapshot } from './console-page.js';
import { inspectJwt, looksLikeJwt } from './jwt-inspector.js';
import { logger, maskSecret, type Logger } from '../utils/logger.js';

/**
 * How one request header maps to a token kind
 */
export interface HeaderRule {
  /** Lower-case header name */
  header: string;
  kind: 'bearer' | 'session';
  /** Auth scheme stripped from the value, e.g. "Bearer" */
  scheme?: string;
  /** Values must also be JWT-shaped */
  requireJwt?: boolean;
  minLength: number;
}

export const DEFAULT_HEADER_RULES: readonly HeaderRule[] = [
  { header: 'authorization', kind: 'bearer', scheme: 'Bearer', minLength: 21 },
  { header: 'token-id', kind: 'session', requireJwt: true, minLength: 21 },
];

/** JSON fields that hold an access token, most specific first */
const ACCESS_FIELDS = ['authToken', 'access_token', 'accessToken', 'jwt'];
/** JSON fields that hold a refresh token */
const REFRESH_FIELDS = ['refreshToken', 'refresh_token', 'refreshJwt'];

const TOKEN_KEY = /token|access|auth|jwt/i;

export interface TokenInterceptorOptions {
  rules?: readonly HeaderRule[];
  now?: () => Date;
}

export class TokenInterceptor {
  private readonly tokens = new Map<TokenKind, CapturedToken>();
  private readonly rules: readonly HeaderRule[];
  private readonly now: () => Date;
  private readonly log: Logger;
  private observedRequests = 0;

  constructor(
    private readonly jobId: string,
    options: TokenInterceptorOptions = {}
  ) {
    this.rules = options.rules ?? DEFAULT_HEADER_RULES;
    this.now = options.now ?? (() => new Date());
    this.log = logger.interceptor.child({ jobId });
  }

  /**
   * Request listener. Header names are compared case-insensitively.
   */
  observe(headers: Record<string, string>, url?: string): void {
    this.observedRequests++;
    try {
      for (const rule of this.rules) {
        if (this.tokens.has(rule.kind)) {
          continue;
        }
        const raw = findHeader(headers, rule.header);
        if (raw === undefined) {
          continue;
        }
        const value = stripScheme(raw, rule.scheme);
        if (value === null || value.length < rule.minLength) {
          continue;
        }
        if (rule.requireJwt && !looksLikeJwt(value)) {
          continue;
        }
        if (this.record(rule.kind, value, 'request-header')) {
          this.log.info('Captured token from request header', {
            kind: rule.kind,
            header: rule.header,
            requestNumber: this.observedRequests,
            requestUrl: url,
          });
        }
      }
    } catch (error) {
      // The tap must never break the request pipeline it observes
      this.log.warn('Request observation failed', { error: String(error) });
    }
  }

  /**
   * Store a token unless the kind already holds one. Returns whether it was stored.
   */
  record(kind: TokenKind, value: string, source: TokenSource): boolean {
    if (this.tokens.has(kind)) {
      return false;
    }
    const timing = inspectJwt(value);
    this.tokens.set(kind, {
      jobId: this.jobId,
      kind,
      value,
      source,
      capturedAt: this.now(),
      issuedAt: timing?.issuedAt,
      expiresAt: timing?.expiresAt,
    });
    return true;
  }

  /**
   * Record an expiry learned out of band (e.g. `expires_in` next to an opaque token).
   */
  private applyExpiryHint(kind: TokenKind, expiresInSeconds: number): void {
    const token = this.tokens.get(kind);
    if (token && !token.expiresAt) {
      token.expiresAt = new Date(this.now().getTime() + expiresInSeconds * 1000);
    }
  }

  get(kind: TokenKind): CapturedToken | undefined {
    const token = this.tokens.get(kind);
    return token ? { ...token } : undefined;
  }

  has(kind: TokenKind): boolean {
    return this.tokens.has(kind);
  }

  capturedTokens(): CapturedTokenSet {
    const set: CapturedTokenSet = {};
    for (const [kind, token] of this.tokens) {
      set[kind] = { ...token };
    }
    return set;
  }

  /**
   * Whether live interception produced any short-lived credential
   */
  capturedLive(): boolean {
    return this.tokens.has('bearer') || this.tokens.has('session');
  }

  get requestCount(): number {
    return this.observedRequests;
  }

  /**
   * Fallback: read browser storage for known token shapes. Only fills kinds
   * that are still empty. Returns the kinds this call captured.
   */
  scrapeStorage(snapshot: StorageSnapshot): TokenKind[] {
    const found: TokenKind[] = [];
    const take = (kind: TokenKind, value: unknown) => {
      if (typeof value === 'string' && value.length > 20 && this.record(kind, value, 'storage')) {
        found.push(kind);
      }
    };

    const areas: Array<[string, Record<string, string>]> = [
      ['localStorage', snapshot.local],
      ['sessionStorage', snapshot.session],
    ];

    for (const [area, entries] of areas) {
      for (const [key, value] of Object.entries(entries)) {
        if (!value) {
          continue;
        }

        const blob = decodeBase64Json(value);
        if (blob) {
          ACCESS_FIELDS.forEach((field) => take('bearer', blob[field]));
          REFRESH_FIELDS.forEach((field) => take('refresh', blob[field]));
          continue;
        }

        if (!TOKEN_KEY.test(key)) {
          continue;
        }

        const json = parseJsonObject(value);
        if (json) {
          ACCESS_FIELDS.forEach((field) => take('bearer', json[field]));
          REFRESH_FIELDS.forEach((field) => take('refresh', json[field]));
          const expiresIn = json.expires_in;
          if (typeof expiresIn === 'number' || typeof expiresIn === 'string') {
            const seconds = Number(expiresIn);
            if (Number.isFinite(seconds) && seconds > 0) {
              this.applyExpiryHint('bearer', seconds);
            }
          }
          continue;
        }

        if (looksLikeJwt(value)) {
          take('bearer', value);
        }
      }

      if (found.length > 0) {
        this.log.debug('Storage area yielded tokens', { area, kinds: [...found] });
      }
    }

    if (found.length > 0) {
      this.log.info('Recovered tokens from browser storage', {
        kinds: found,
        preview: found.map((kind) => `${kind}:${maskSecret(this.tokens.get(kind)?.value, 6)}`),
      });
    }
    return found;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function findHeader(headers: Record<string, string>, name: string): string | undefined {
  if (name in headers) {
    return headers[name];
  }
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === name) {
      return value;
    }
  }
  return undefined;
}

function stripScheme(raw: string, scheme?: string): string | null {
  const trimmed = raw.trim();
  if (!scheme) {
    return trimmed;
  }
  const prefix = `${scheme.toLowerCase()} `;
  if (!trimmed.toLowerCase().startsWith(prefix)) {
    return null;
  }
  return trimmed.slice(prefix.length).trim();
}

function parseJsonObject(value: string): Record<string, unknown> | null {
  const trimmed = value.trim();
  if (!trimmed.startsWith('{')) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(trimmed);
    return isPlainObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Decode a standard-base64 value that wraps a JSON object. Padding is optional.
 */
export function decodeBase64Json(value: string): Record<string, unknown> | null {
  const trimmed = value.trim();
  // '{"' encodes to "eyJ"
  if (!trimmed.startsWith('eyJ') || !/^[A-Za-z0-9+/]+={0,2}$/.test(trimmed)) {
    return null;
  }
  const unpadded = trimmed.replace(/=+$/, '');
  const remainder = unpadded.length % 4;
  if (remainder === 1) {
    return null;
  }
  const padded = remainder === 0 ? unpadded : unpadded + '='.repeat(4 - remainder);
  return parseJsonObject(Buffer.from(padded, 'base64').toString('utf8'));
}
