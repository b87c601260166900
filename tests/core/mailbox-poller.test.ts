import { describe, it, expect } from 'vitest';
import {
  ConsumedMessageRegistry,
  MailboxPoller,
  extractOtp,
  htmlToText,
} from '../../src/core/mailbox-poller.js';
import { FakeMailbox } from '../helpers/fake-mailbox.js';
import { mailboxSettings } from '../helpers/fixtures.js';

const SENT_AT = new Date('2030-01-01T10:00:00Z');
const AFTER_SEND = new Date('2030-01-01T10:00:30Z');

function poller(mailbox: FakeMailbox, registry = new ConsumedMessageRegistry()): MailboxPoller {
  return new MailboxPoller({
    settings: mailboxSettings({ clockSkewMs: 60000 }),
    transportFactory: mailbox.factory,
    registry,
    jobId: 'job-1',
  });
}

const FAST = { maxAttempts: 3, intervalMs: 1 };

describe('extractOtp', () => {
  it.each([
    ['Your login security code: 482913', '482913'],
    ['Login Security Code:   123456\nIt expires in 10 minutes.', '123456'],
    ['Your verification code: 654321', '654321'],
    ['Use code: 777777 to sign in', '777777'],
    ['Enter 246810 on the sign-in page', '246810'],
  ])('should read the code from %j', (body, code) => {
    expect(extractOtp(body)).toBe(code);
  });

  it('should prefer the labelled code over other six-digit numbers', () => {
    expect(extractOtp('Ticket 999999 was opened. Your login security code: 482913')).toBe('482913');
  });

  it('should return null without a code', () => {
    expect(extractOtp('Welcome to the console')).toBeNull();
    expect(extractOtp('Reference 1234567')).toBeNull();
  });
});

describe('htmlToText', () => {
  it('should strip markup, scripts and entities', () => {
    const html = '<style>p{}</style><p>Your login security code:&nbsp;<b>482913</b></p><br/>Thanks &amp; bye';

    expect(htmlToText(html)).toBe('Your login security code: 482913 \nThanks & bye');
  });
});

describe('MailboxPoller', () => {
  it('should return the code and flag the message as seen', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({ uid: 41, receivedAt: AFTER_SEND, subject: 'Login security code', body: 'Your login security code: 482913' });

    const code = await poller(mailbox).awaitCode(SENT_AT, FAST);

    expect(code).toBe('482913');
    expect(mailbox.seenFlags).toEqual([41]);
    expect(mailbox.closed).toBe(1);
  });

  it('should yield nothing for a message already consumed', async () => {
    const mailbox = new FakeMailbox();
    const registry = new ConsumedMessageRegistry();
    mailbox.add({ uid: 41, receivedAt: AFTER_SEND, subject: 'Login security code', body: 'Your login security code: 482913' });

    expect(await poller(mailbox, registry).awaitCode(SENT_AT, FAST)).toBe('482913');
    expect(await poller(mailbox, registry).awaitCode(SENT_AT, { maxAttempts: 1, intervalMs: 1 })).toBeNull();
    expect(registry.size).toBe(1);
  });

  it('should give one code to only one of two pollers sharing a mailbox', async () => {
    const mailbox = new FakeMailbox();
    const registry = new ConsumedMessageRegistry();
    mailbox.add({ uid: 41, receivedAt: AFTER_SEND, subject: 'Login security code', body: 'Your login security code: 482913' });

    const results = await Promise.all([
      poller(mailbox, registry).awaitCode(SENT_AT, { maxAttempts: 1, intervalMs: 1 }),
      poller(mailbox, registry).awaitCode(SENT_AT, { maxAttempts: 1, intervalMs: 1 }),
    ]);

    expect(results.filter((code) => code === '482913')).toHaveLength(1);
    expect(results.filter((code) => code === null)).toHaveLength(1);
  });

  it('should keep polling until the code arrives', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({
      uid: 42,
      receivedAt: AFTER_SEND,
      subject: 'Login security code',
      body: 'Your login security code: 482913',
      arrivesOnAttempt: 3,
    });

    const code = await poller(mailbox).awaitCode(SENT_AT, { maxAttempts: 5, intervalMs: 1 });

    expect(code).toBe('482913');
    expect(mailbox.connections).toBe(3);
    expect(mailbox.closed).toBe(3);
  });

  it('should return null after the attempt bound', async () => {
    const mailbox = new FakeMailbox();

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBeNull();
    expect(mailbox.connections).toBe(3);
  });

  it('should ignore messages older than the send time minus clock skew', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({
      uid: 40,
      receivedAt: new Date('2030-01-01T09:58:00Z'),
      subject: 'Login security code',
      body: 'Your login security code: 111111',
    });
    mailbox.add({
      uid: 39,
      receivedAt: new Date('2030-01-01T09:59:30Z'),
      subject: 'Login security code',
      body: 'Your login security code: 222222',
    });

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBe('222222');
  });

  it('should take the newest message first', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({ uid: 5, receivedAt: AFTER_SEND, subject: 'code', body: 'Your login security code: 111111' });
    mailbox.add({ uid: 7, receivedAt: AFTER_SEND, subject: 'code', body: 'Your login security code: 222222' });

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBe('222222');
  });

  it('should fall back to read messages when nothing is unread', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({ uid: 8, receivedAt: AFTER_SEND, subject: 'code', body: 'Your login security code: 333333', seen: true });

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBe('333333');
    expect(mailbox.searches.map((search) => search.unseenOnly)).toEqual([true, false]);
    expect(mailbox.searches[0].since).toEqual(new Date('2030-01-01T09:59:00Z'));
  });

  it('should not take a read message from before the send time', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({
      uid: 12,
      receivedAt: new Date('2030-01-01T09:59:30Z'),
      subject: 'code',
      body: 'Your login security code: 111111',
      seen: true,
    });

    expect(await poller(mailbox).awaitCode(SENT_AT, { maxAttempts: 1, intervalMs: 1 })).toBeNull();
    expect(mailbox.seenFlags).toEqual([]);
  });

  it('should still allow clock skew for an unread message', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({
      uid: 13,
      receivedAt: new Date('2030-01-01T09:59:30Z'),
      subject: 'code',
      body: 'Your login security code: 121212',
    });

    expect(await poller(mailbox).awaitCode(SENT_AT, { maxAttempts: 1, intervalMs: 1 })).toBe('121212');
  });

  it('should spend one attempt on a failed connection', async () => {
    const mailbox = new FakeMailbox();
    mailbox.failingConnections.add(1);
    mailbox.add({ uid: 9, receivedAt: AFTER_SEND, subject: 'code', body: 'Your login security code: 444444' });

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBe('444444');
    expect(mailbox.connections).toBe(2);
    expect(mailbox.closed).toBe(2);
  });

  it('should still return the code when the seen flag cannot be set', async () => {
    const mailbox = new FakeMailbox();
    mailbox.failMarkSeen = true;
    mailbox.add({ uid: 10, receivedAt: AFTER_SEND, subject: 'code', body: 'Your login security code: 555555' });

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBe('555555');
    expect(mailbox.seenFlags).toEqual([]);
  });

  it('should read the code from the subject line', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add({ uid: 11, receivedAt: AFTER_SEND, subject: 'Your login security code: 666666', body: '' });

    expect(await poller(mailbox).awaitCode(SENT_AT, FAST)).toBe('666666');
  });

  it('should stop with the abort reason', async () => {
    const mailbox = new FakeMailbox();
    const controller = new AbortController();
    const reason = new Error('job timed out');
    controller.abort(reason);

    await expect(poller(mailbox).awaitCode(SENT_AT, { ...FAST, signal: controller.signal })).rejects.toBe(reason);
    expect(mailbox.connections).toBe(0);
  });
});
