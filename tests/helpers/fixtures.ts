import { parseStrategyTable, type StrategyTable } from '../../src/core/strategy-table.js';
import type { JobConfig, MailboxSettings } from '../../src/types/provisioning.js';

function base64Url(value: string): string {
  return Buffer.from(value, 'utf8').toString('base64url');
}

/**
 * Unsigned JWT with the given claims; the signature segment is a placeholder.
 */
export function makeJwt(claims: Record<string, unknown>): string {
  return `${base64Url(JSON.stringify({ alg: 'HS256', typ: 'JWT' }))}.${base64Url(JSON.stringify(claims))}.test-signature`;
}

/** 2030-01-01T00:00:00Z */
export const EXPIRY_SECONDS = 1893456000;
/** 2029-12-31T23:00:00Z */
export const ISSUED_SECONDS = 1893452400;

export const BEARER_JWT = makeJwt({ sub: 'user-1', iat: ISSUED_SECONDS, exp: EXPIRY_SECONDS });
export const SESSION_JWT = makeJwt({ sid: 'session-1', iat: ISSUED_SECONDS, exp: EXPIRY_SECONDS + 3600 });
export const INTEGRATION_TOKEN = 'pit-test-0000-aaaa-bbbb-cccc';

export const TEST_URLS = {
  login: 'https://console.example.test/login',
  dashboard: 'https://console.example.test/v2/location/tenant-handle/dashboard',
  integrations: 'https://console.example.test/v2/location/tenant-handle/settings/private-integrations/',
};

/**
 * A strategy table with one short selector per action, matching FakeConsole.
 */
export function testStrategyTable(): StrategyTable {
  return parseStrategyTable(
    {
      version: 1,
      actions: {
        'login.identity': [{ name: 'email', selector: '#email' }],
        'login.secret': [{ name: 'password', selector: '#password' }],
        'login.submit': [{ name: 'submit', selector: '#login' }],
        'probe.loginForm': [{ name: 'password-field', selector: '#password' }],
        'probe.mfaChallenge': [
          { name: 'digits', selector: '.digit' },
          { name: 'otp', selector: '#otp' },
        ],
        'mfa.sendCode': [{ name: 'send', selector: '#send-code' }],
        'mfa.code': [
          { name: 'digits', selector: '.digit', mode: 'per-digit' },
          { name: 'otp', selector: '#otp', mode: 'single' },
        ],
        'mfa.submit': [{ name: 'verify', selector: '#verify' }],
        'wizard.createPrimary': [{ name: 'create-private', selector: '#create-private' }],
        'wizard.createFallback': [{ name: 'create-any', selector: '#create-any' }],
        'wizard.name': [{ name: 'name', selector: '#integration-name' }],
        'wizard.next': [{ name: 'next', selector: '#next' }],
        'wizard.scopeInput': [{ name: 'scope-search', selector: '#scope-search' }],
        'wizard.scopeAccepted': [{ name: 'chip', selector: '.chip[data-scope="{scope}"]' }],
        'wizard.submit': [{ name: 'create', selector: '#create' }],
        'wizard.tokenDialog': [{ name: 'dialog-input', selector: '#token-dialog input' }],
        'wizard.copyButton': [{ name: 'copy', selector: '#copy' }],
        'wizard.tokenCandidates': [{ name: 'code', selector: 'code' }],
      },
    },
    'test'
  );
}

export function mailboxSettings(overrides: Partial<MailboxSettings> = {}): MailboxSettings {
  return {
    host: 'imap.example.test',
    port: 993,
    secure: true,
    user: 'otp-inbox@example.test',
    password: 'test-secret',
    mailbox: 'INBOX',
    maxAttempts: 30,
    pollIntervalMs: 1000,
    clockSkewMs: 60000,
    ...overrides,
  };
}

export function jobConfig(overrides: Partial<JobConfig> = {}): JobConfig {
  return {
    tenantId: 'tenant-1',
    loginIdentity: 'operator@example.test',
    loginSecret: 'test-secret',
    targetTenantHandle: 'tenant-handle',
    scopeSet: ['View Contacts', 'Edit Contacts'],
    integrationName: 'location key',
    flavor: 'full',
    console: {
      loginUrl: TEST_URLS.login,
      integrationsUrl: TEST_URLS.integrations,
      authenticatedPattern: /\/v2\/location\/|\/dashboard/,
      integrationTokenPrefix: 'pit-',
      integrationTokenMinLength: 20,
    },
    mailbox: mailboxSettings(),
    timeoutMs: 300000,
    ...overrides,
  };
}
