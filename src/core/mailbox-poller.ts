/**
 * Mailbox Poller - waits for the console's verification email and pulls the code out
 *
 * Each attempt opens a fresh IMAP connection, searches unread messages first
 * and then read messages since the send time, and takes the newest message
 * that yields a code. A message is consumed exactly once: it is claimed in a
 * process-wide registry (so concurrent pollers sharing a mailbox never return
 * the same code) and flagged \Seen on the server. The clock-skew allowance
 * applies to unread messages only: a read message from before the send time
 * belongs to an earlier login.
 */

import { ImapFlow } from 'imapflow';
import { simpleParser } from 'mailparser';
import type { MailboxSettings } from '../types/provisioning.js';
import { logger, type Logger } from '../utils/logger.js';
import { errorCode, sleep } from '../utils/retry.js';

// ============================================
// CODE EXTRACTION
// ============================================

/**
 * Most specific first; the bare six-digit pattern is the last resort.
 */
export const OTP_PATTERNS: readonly RegExp[] = [
  /your login security code:\s*(\d{6})/i,
  /login security code:\s*(\d{6})/i,
  /security code:\s*(\d{6})/i,
  /verification code:\s*(\d{6})/i,
  /code:\s*(\d{6})/i,
  /\b(\d{6})\b/,
];

export function extractOtp(body: string, patterns: readonly RegExp[] = OTP_PATTERNS): string | null {
  for (const pattern of patterns) {
    const match = pattern.exec(body);
    if (match?.[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Plain text for an HTML-only message.
 */
export function htmlToText(html: string): string {
  return html
    .replace(/<(script|style)[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]+>/g, ' ')
    .replace(/&nbsp;/gi, ' ')
    .replace(/&amp;/gi, '&')
    .replace(/[ \t]+/g, ' ')
    .trim();
}

// ============================================
// TRANSPORT
// ============================================

export interface MailSearch {
  unseenOnly: boolean;
  since: Date;
  sender?: string;
  subject?: string;
}

export interface MailMessage {
  uid: number;
  receivedAt: Date;
  subject: string;
  body: string;
}

/**
 * One mailbox connection. Opened per poll attempt and always closed.
 */
export interface MailboxTransport {
  connect(): Promise<void>;
  /** UIDs matching the search, in any order */
  search(criteria: MailSearch): Promise<number[]>;
  fetch(uid: number): Promise<MailMessage | null>;
  markSeen(uid: number): Promise<void>;
  close(): Promise<void>;
}

export type MailboxTransportFactory = () => MailboxTransport;

/**
 * IMAP over TLS through imapflow.
 */
export class ImapFlowTransport implements MailboxTransport {
  private readonly client: ImapFlow;
  private releaseLock: (() => void) | null = null;
  private failure: Error | null = null;

  constructor(private readonly settings: MailboxSettings) {
    this.client = new ImapFlow({
      host: settings.host,
      port: settings.port,
      secure: settings.secure,
      auth: { user: settings.user, pass: settings.password },
      logger: false,
    });
    // imapflow emits socket failures after connect; unhandled they would crash the process
    this.client.on('error', (error: Error) => {
      this.failure = error;
      logger.mailbox.warn('Mailbox connection error', { errorName: error.name, errorCode: errorCode(error) });
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
    this.assertHealthy();
    const lock = await this.client.getMailboxLock(this.settings.mailbox);
    this.releaseLock = () => lock.release();
  }

  async search(criteria: MailSearch): Promise<number[]> {
    this.assertHealthy();
    const result = await this.client.search(
      {
        seen: criteria.unseenOnly ? false : undefined,
        since: criteria.since,
        from: criteria.sender,
        subject: criteria.subject,
      },
      { uid: true }
    );
    return Array.isArray(result) ? result : [];
  }

  async fetch(uid: number): Promise<MailMessage | null> {
    this.assertHealthy();
    const message = await this.client.fetchOne(String(uid), { source: true, internalDate: true }, { uid: true });
    if (!message || !message.source) {
      return null;
    }
    const parsed = await simpleParser(message.source);
    const text = parsed.text ?? (typeof parsed.html === 'string' ? htmlToText(parsed.html) : '');
    return {
      uid,
      receivedAt: new Date(message.internalDate ?? parsed.date ?? Date.now()),
      subject: parsed.subject ?? '',
      body: text,
    };
  }

  async markSeen(uid: number): Promise<void> {
    this.assertHealthy();
    await this.client.messageFlagsAdd(String(uid), ['\\Seen'], { uid: true });
  }

  /**
   * Safe before the mailbox lock is held and after a failed connect.
   */
  async close(): Promise<void> {
    this.releaseLock?.();
    this.releaseLock = null;
    await this.client.logout();
  }

  private assertHealthy(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}

// ============================================
// CONSUMPTION REGISTRY
// ============================================

/**
 * Messages already turned into a code. Shared by every poller in the process.
 */
export class ConsumedMessageRegistry {
  private readonly consumed = new Set<string>();

  has(key: string): boolean {
    return this.consumed.has(key);
  }

  /**
   * Returns false when another poller got there first.
   */
  claim(key: string): boolean {
    if (this.consumed.has(key)) {
      return false;
    }
    this.consumed.add(key);
    return true;
  }

  get size(): number {
    return this.consumed.size;
  }
}

export const sharedConsumedMessages = new ConsumedMessageRegistry();

// ============================================
// POLLER
// ============================================

export interface AwaitCodeOptions {
  maxAttempts: number;
  intervalMs: number;
  signal?: AbortSignal;
}

export interface MailboxPollerOptions {
  settings: MailboxSettings;
  transportFactory?: MailboxTransportFactory;
  registry?: ConsumedMessageRegistry;
  patterns?: readonly RegExp[];
  jobId?: string;
}

/** Candidates inspected per search, newest first */
const MAX_CANDIDATES = 5;

export class MailboxPoller {
  private readonly settings: MailboxSettings;
  private readonly transportFactory: MailboxTransportFactory;
  private readonly registry: ConsumedMessageRegistry;
  private readonly patterns: readonly RegExp[];
  private readonly log: Logger;

  constructor(options: MailboxPollerOptions) {
    this.settings = options.settings;
    this.transportFactory = options.transportFactory ?? (() => new ImapFlowTransport(options.settings));
    this.registry = options.registry ?? sharedConsumedMessages;
    this.patterns = options.patterns ?? OTP_PATTERNS;
    this.log = logger.mailbox.child({ jobId: options.jobId });
  }

  /**
   * Poll until a code sent after `sentAfter` shows up. Returns null once
   * `maxAttempts` checks came back empty. A failed connection uses up one
   * attempt and nothing more.
   */
  async awaitCode(sentAfter: Date, options: AwaitCodeOptions): Promise<string | null> {
    const windowStart = new Date(sentAfter.getTime() - this.settings.clockSkewMs);
    const startTime = Date.now();

    for (let attempt = 1; attempt <= options.maxAttempts; attempt++) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }

      try {
        const code = await this.checkOnce(sentAfter, windowStart);
        if (code) {
          this.log.timed('Verification code received', startTime, { attempt });
          return code;
        }
        this.log.debug('No verification code yet', { attempt, maxAttempts: options.maxAttempts });
      } catch (error) {
        this.log.warn('Mailbox check failed', {
          attempt,
          errorName: error instanceof Error ? error.name : typeof error,
          errorCode: errorCode(error),
        });
      }

      if (attempt < options.maxAttempts) {
        await sleep(options.intervalMs, options.signal);
      }
    }

    this.log.warn('Verification code never arrived', {
      attempts: options.maxAttempts,
      intervalMs: options.intervalMs,
    });
    return null;
  }

  private async checkOnce(sentAfter: Date, windowStart: Date): Promise<string | null> {
    const transport = this.transportFactory();
    try {
      await transport.connect();
      const criteria = {
        since: windowStart,
        sender: this.settings.sender,
        subject: this.settings.subject,
      };
      let uids = await transport.search({ ...criteria, unseenOnly: true });
      let notBefore = windowStart;
      if (uids.length === 0) {
        uids = await transport.search({ ...criteria, unseenOnly: false });
        notBefore = sentAfter;
      }

      const candidates = [...new Set(uids)]
        .filter((uid) => !this.registry.has(this.messageKey(uid)))
        .sort((a, b) => b - a)
        .slice(0, MAX_CANDIDATES);

      for (const uid of candidates) {
        const message = await transport.fetch(uid);
        // IMAP SINCE has day granularity; the real window is enforced here
        if (!message || message.receivedAt.getTime() < notBefore.getTime()) {
          continue;
        }
        const code = extractOtp(`${message.body}\n${message.subject}`, this.patterns);
        if (!code) {
          continue;
        }
        if (!this.registry.claim(this.messageKey(uid))) {
          continue;
        }
        await this.markSeen(transport, uid);
        return code;
      }
      return null;
    } finally {
      await this.closeQuietly(transport);
    }
  }

  private async markSeen(transport: MailboxTransport, uid: number): Promise<void> {
    try {
      await transport.markSeen(uid);
    } catch (error) {
      // The claim already guarantees single use within this process
      this.log.warn('Could not flag verification email as seen', {
        uid,
        errorName: error instanceof Error ? error.name : typeof error,
      });
    }
  }

  private async closeQuietly(transport: MailboxTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      this.log.debug('Mailbox logout failed', { errorName: error instanceof Error ? error.name : typeof error });
    }
  }

  private messageKey(uid: number): string {
    return `${this.settings.user}/${this.settings.mailbox}/${uid}`;
  }
}
