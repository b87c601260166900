import { afterEach, describe, it, expect, vi } from 'vitest';
import { BrowserSessionController } from '../../src/core/browser-session.js';
import { MemoryCredentialStore } from '../../src/core/credential-store.js';
import type { CodeSource } from '../../src/core/login-state-machine.js';
import { ConsumedMessageRegistry, MailboxPoller } from '../../src/core/mailbox-poller.js';
import {
  ProvisioningOrchestrator,
  canTransition,
  decideOutcome,
  loginStepBudget,
  type OrchestratorDependencies,
} from '../../src/core/provisioning-orchestrator.js';
import { loadDefaultScopes } from '../../src/core/strategy-table.js';
import type {
  CapturedToken,
  CapturedTokenSet,
  CredentialUpdate,
  JobStatus,
  ProvisioningFlavor,
  ResultStatus,
  TenantCredentialRecord,
} from '../../src/types/provisioning.js';
import { FatalEnvironmentError, PersistenceFailureError } from '../../src/utils/errors.js';
import { FakeConsole, type FakeConsoleOptions } from '../helpers/fake-console.js';
import { FakeMailbox, ScriptedCodeSource } from '../helpers/fake-mailbox.js';
import { FakeLauncher } from '../helpers/fake-page.js';
import {
  BEARER_JWT,
  EXPIRY_SECONDS,
  INTEGRATION_TOKEN,
  SESSION_JWT,
  TEST_URLS,
  jobConfig,
  mailboxSettings,
  testStrategyTable,
} from '../helpers/fixtures.js';

const LOGIN_NO_WAIT = {
  afterSubmit: 0,
  afterSendCode: 0,
  afterCodeEntry: 0,
  betweenDigits: 0,
  betweenProbes: 0,
  retryBackoff: 0,
};
const WIZARD_NO_WAIT = { afterNavigate: 0, afterStep: 0, scopeFilter: 0, scopeAccept: 10, retryBackoff: 0 };

interface Harness {
  site: FakeConsole;
  launcher: FakeLauncher;
  sessions: BrowserSessionController;
  store: MemoryCredentialStore;
  orchestrator: ProvisioningOrchestrator;
}

function harness(
  options: {
    site?: FakeConsoleOptions;
    codeSource?: CodeSource;
    mailbox?: FakeMailbox;
    launcher?: FakeLauncher;
    store?: MemoryCredentialStore;
  } = {}
): Harness {
  const site = new FakeConsole(options.site);
  const launcher = options.launcher ?? new FakeLauncher({ pageFactory: () => site.page });
  const sessions = new BrowserSessionController(launcher);
  const store = options.store ?? new MemoryCredentialStore();
  const mailbox = options.mailbox;
  const codeSourceFactory: OrchestratorDependencies['codeSourceFactory'] = (job, config) =>
    mailbox
      ? new MailboxPoller({
          settings: config.mailbox,
          transportFactory: mailbox.factory,
          registry: new ConsumedMessageRegistry(),
          jobId: job.id,
        })
      : (options.codeSource ?? new ScriptedCodeSource('482913'));

  const orchestrator = new ProvisioningOrchestrator({
    sessions,
    store,
    strategies: testStrategyTable(),
    codeSourceFactory,
    idFactory: () => 'job-1',
    loginSettle: LOGIN_NO_WAIT,
    wizardSettle: WIZARD_NO_WAIT,
  });
  return { site, launcher, sessions, store, orchestrator };
}

function codeMail(uid: number, code: string, arrivesOnAttempt?: number) {
  return {
    uid,
    receivedAt: new Date(),
    subject: 'Login security code',
    body: `Your login security code: ${code}`,
    arrivesOnAttempt,
  };
}

describe('ProvisioningOrchestrator', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should complete a full job when the code arrives on the third poll', async () => {
    const mailbox = new FakeMailbox();
    mailbox.add(codeMail(50, '482913', 3));
    const { site, orchestrator, store, sessions } = harness({ mailbox });
    const statuses: JobStatus[] = [];

    const result = await orchestrator.run(jobConfig({ mailbox: mailboxSettings({ pollIntervalMs: 1 }) }), {
      onStatus: (job) => statuses.push(job.status),
    });

    expect(result).toMatchObject({
      jobId: 'job-1',
      tenantId: 'tenant-1',
      status: 'completed',
      captured: { bearer: BEARER_JWT, session: SESSION_JWT, integration: INTEGRATION_TOKEN },
      missing: [],
      expiresAt: new Date(EXPIRY_SECONDS * 1000),
      skippedScopes: [],
      extraction: 'result-dialog',
      persisted: true,
      warnings: [],
    });
    expect(result.error).toBeUndefined();
    expect(statuses).toEqual(['authenticating', 'awaiting_mfa', 'capturing', 'provisioning', 'persisting', 'completed']);
    expect(mailbox.connections).toBe(3);
    expect(site.enteredCode).toBe('482913');
    expect(site.page.visited).toEqual([TEST_URLS.login, TEST_URLS.integrations]);
    expect(sessions.openSessions).toBe(0);

    expect(await store.get('tenant-1')).toMatchObject({
      bearer: BEARER_JWT,
      session: SESSION_JWT,
      integration: INTEGRATION_TOKEN,
      expiresAt: new Date(EXPIRY_SECONDS * 1000),
      sessionExpiresAt: new Date((EXPIRY_SECONDS + 3600) * 1000),
    });
    expect(await store.listRuns('tenant-1')).toMatchObject([
      { jobId: 'job-1', outcome: 'completed', finalStatus: 'completed', reason: null, capturedKinds: ['bearer', 'session', 'integration'] },
    ]);
  });

  it('should fail with otp_timeout after the full polling window and close the browser', async () => {
    vi.useFakeTimers();
    const mailbox = new FakeMailbox();
    const { launcher, orchestrator, sessions, store } = harness({ mailbox });
    const statuses: JobStatus[] = [];

    const pending = orchestrator.run(jobConfig(), { onStatus: (job) => statuses.push(job.status) });
    await vi.advanceTimersByTimeAsync(31_000);
    const result = await pending;

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('otp_timeout');
    expect(result.durationMs).toBeGreaterThanOrEqual(29_000);
    expect(result.durationMs).toBeLessThanOrEqual(31_000);
    expect(result.persisted).toBe(false);
    expect(mailbox.connections).toBe(30);
    expect(statuses).toEqual(['authenticating', 'awaiting_mfa', 'failed']);
    expect(launcher.openBrowsers).toBe(0);
    expect(sessions.openSessions).toBe(0);
    expect(await store.get('tenant-1')).toBeNull();
    expect(await store.listRuns('tenant-1')).toMatchObject([{ outcome: 'failed', reason: 'otp_timeout' }]);
  });

  it('should report otp_timeout when the polling window outlasts the base login budget', async () => {
    vi.useFakeTimers();
    const mailbox = new FakeMailbox();
    const { launcher, orchestrator } = harness({ mailbox });

    const pending = orchestrator.run(jobConfig({ mailbox: mailboxSettings({ maxAttempts: 150 }) }));
    await vi.advanceTimersByTimeAsync(151_000);
    const result = await pending;

    expect(result.error?.code).toBe('otp_timeout');
    expect(mailbox.connections).toBe(150);
    expect(launcher.openBrowsers).toBe(0);
  });

  it('should read the integration token from the clipboard when the dialog hides it', async () => {
    const { orchestrator } = harness({ site: { tokenDialog: false } });

    const result = await orchestrator.run(jobConfig());

    expect(result.status).toBe('completed');
    expect(result.extraction).toBe('clipboard');
    expect(result.captured.integration).toBe(INTEGRATION_TOKEN);
  });

  it('should complete with the default scopes and report the two rejected ones', async () => {
    const rejected = ['View Conversation Reports', 'View Tags'];
    const { orchestrator } = harness({ site: { rejectedScopes: rejected } });

    const result = await orchestrator.run(jobConfig({ scopeSet: loadDefaultScopes() }));

    expect(result.status).toBe('completed');
    expect(result.skippedScopes).toEqual(rejected);
    expect(result.captured.integration).toBe(INTEGRATION_TOKEN);
  });

  it('should refresh live tokens without touching the stored integration token', async () => {
    const store = new MemoryCredentialStore();
    await store.upsert('tenant-1', { integration: 'pit-test-9999-aaaa-bbbb-cccc' });
    const { orchestrator, site } = harness({ store });
    const statuses: JobStatus[] = [];

    const result = await orchestrator.run(jobConfig({ flavor: 'token-refresh' }), {
      onStatus: (job) => statuses.push(job.status),
    });

    expect(result.status).toBe('completed');
    expect(result.missing).toEqual([]);
    expect(result.captured.integration).toBeUndefined();
    expect(statuses).toEqual(['authenticating', 'awaiting_mfa', 'capturing', 'persisting', 'completed']);
    expect(site.page.visited).toEqual([TEST_URLS.login]);
    expect(await store.get('tenant-1')).toMatchObject({
      bearer: BEARER_JWT,
      integration: 'pit-test-9999-aaaa-bbbb-cccc',
    });
  });

  it('should fall back to browser storage when no header carried a token', async () => {
    const blob = Buffer.from(
      JSON.stringify({ authToken: BEARER_JWT, refreshToken: 'refresh-test-token-0123456789' })
    ).toString('base64');
    const { orchestrator } = harness({
      site: { bearer: null, session: null, storage: { local: { a: blob }, session: {} } },
    });

    const result = await orchestrator.run(jobConfig({ flavor: 'token-refresh' }));

    expect(result.status).toBe('completed');
    expect(result.captured).toEqual({ bearer: BEARER_JWT, refresh: 'refresh-test-token-0123456789' });
    expect(result.missing).toEqual(['session']);
  });

  it('should report partial when only the integration token was captured', async () => {
    const { orchestrator } = harness({ site: { bearer: null, session: null } });

    const result = await orchestrator.run(jobConfig());

    expect(result.status).toBe('partial');
    expect(result.captured).toEqual({ integration: INTEGRATION_TOKEN });
    expect(result.missing).toEqual(['bearer', 'session']);
    expect(result.persisted).toBe(true);
  });

  it('should report partial with the wizard error when no integration token was read', async () => {
    const { orchestrator } = harness({ site: { tokenDialog: false, clipboard: false } });

    const result = await orchestrator.run(jobConfig());

    expect(result.status).toBe('partial');
    expect(result.missing).toEqual(['integration']);
    expect(result.error?.code).toBe('integration_not_extracted');
    expect(result.warnings).toHaveLength(1);
    expect(result.warnings[0].startsWith('Integration not minted at EXTRACT_TOKEN')).toBe(true);
  });

  it('should keep the outcome when persistence fails', async () => {
    class BrokenStore extends MemoryCredentialStore {
      override async upsert(_tenantId: string, _update: CredentialUpdate): Promise<TenantCredentialRecord> {
        throw new PersistenceFailureError('Credential store upsert failed');
      }
    }
    const { orchestrator } = harness({ store: new BrokenStore() });

    const result = await orchestrator.run(jobConfig());

    expect(result.status).toBe('completed');
    expect(result.persisted).toBe(false);
    expect(result.warnings).toEqual(['Credentials not persisted: Credential store upsert failed']);
    expect(result.captured.bearer).toBe(BEARER_JWT);
  });

  it('should fail with login reason when the code never comes', async () => {
    const { orchestrator } = harness({ codeSource: new ScriptedCodeSource(null) });

    const result = await orchestrator.run(jobConfig());

    expect(result).toMatchObject({ status: 'failed', persisted: false, captured: {} });
    expect(result.error?.code).toBe('otp_timeout');
  });

  it('should fail with fatal_environment when the browser cannot start', async () => {
    const launcher = new FakeLauncher({ failLaunch: new FatalEnvironmentError('Playwright is not installed') });
    const { orchestrator } = harness({ launcher });
    const statuses: JobStatus[] = [];

    const result = await orchestrator.run(jobConfig(), { onStatus: (job) => statuses.push(job.status) });

    expect(result.status).toBe('failed');
    expect(result.error).toEqual({ code: 'fatal_environment', message: 'Playwright is not installed' });
    expect(statuses).toEqual(['failed']);
  });

  it('should abort at the job timeout and still tear the browser down', async () => {
    vi.useFakeTimers();
    const mailbox = new FakeMailbox();
    const { launcher, orchestrator } = harness({ mailbox });

    const pending = orchestrator.run(jobConfig({ timeoutMs: 5_000 }));
    await vi.advanceTimersByTimeAsync(5_000);
    const result = await pending;

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('job_timeout');
    expect(launcher.closeOrder).toEqual(['page-1', 'context-1', 'browser-1']);
    expect(launcher.openBrowsers).toBe(0);
  });

  it('should stop with aborted when the caller cancels', async () => {
    const { launcher, orchestrator } = harness();
    const controller = new AbortController();
    controller.abort();

    const result = await orchestrator.run(jobConfig(), { signal: controller.signal });

    expect(result.status).toBe('failed');
    expect(result.error?.code).toBe('aborted');
    expect(launcher.openBrowsers).toBe(0);
  });
});

describe('loginStepBudget', () => {
  it('should add the OTP polling window to the base budget', () => {
    expect(loginStepBudget({ maxAttempts: 120, pollIntervalMs: 1000 })).toBe(240_000);
    expect(loginStepBudget({ maxAttempts: 30, pollIntervalMs: 2000 }, 5000)).toBe(65_000);
  });
});

describe('decideOutcome', () => {
  const token = (kind: CapturedToken['kind']): CapturedToken => ({
    jobId: 'job-1',
    kind,
    value: `${kind}-test-value`,
    source: 'request-header',
    capturedAt: new Date(0),
  });

  const cases: Array<[ProvisioningFlavor, boolean, CapturedTokenSet, ResultStatus]> = [
    ['full', true, { bearer: token('bearer'), integration: token('integration') }, 'completed'],
    ['full', true, { session: token('session'), integration: token('integration') }, 'completed'],
    ['full', true, { bearer: token('bearer') }, 'partial'],
    ['full', true, { integration: token('integration') }, 'partial'],
    ['full', true, { refresh: token('refresh') }, 'failed'],
    ['full', false, { bearer: token('bearer'), integration: token('integration') }, 'failed'],
    ['token-refresh', true, { session: token('session') }, 'completed'],
    ['token-refresh', true, {}, 'failed'],
  ];

  it.each(cases)('%s flavor, authenticated=%s, tokens %j gives %s', (flavor, authenticated, tokens, expected) => {
    expect(decideOutcome(flavor, authenticated, tokens)).toBe(expected);
  });
});

describe('canTransition', () => {
  it('should follow the job lifecycle', () => {
    expect(canTransition('pending', 'authenticating')).toBe(true);
    expect(canTransition('authenticating', 'capturing')).toBe(true);
    expect(canTransition('capturing', 'persisting')).toBe(true);
    expect(canTransition('provisioning', 'failed')).toBe(true);
  });

  it('should refuse skips and moves out of terminal states', () => {
    expect(canTransition('pending', 'completed')).toBe(false);
    expect(canTransition('authenticating', 'provisioning')).toBe(false);
    expect(canTransition('completed', 'failed')).toBe(false);
    expect(canTransition('failed', 'pending')).toBe(false);
  });
});
