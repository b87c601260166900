/**
 * Provisioning Orchestrator
 *
 * Runs one job end to end inside a browser session:
 *
 *   pending → authenticating → (awaiting_mfa →) capturing → (provisioning →) persisting → completed
 *
 * Any non-terminal status may move to `failed`. The job owns its status; no
 * other component mutates it. A job-level timer aborts the run, and the
 * session controller tears the browser down on that path as on every other.
 *
 * Outcome rules:
 * - login never reached AUTHENTICATED: `failed`
 * - `full` flavor: integration token plus a bearer or session token is
 *   `completed`; any one of them alone is `partial`
 * - `token-refresh` flavor: a bearer or session token is `completed`
 * - a persistence failure is a warning and never changes the outcome
 */

import { randomUUID } from 'crypto';
import type {
  CapturedTokenSet,
  CredentialUpdate,
  JobConfig,
  JobStatus,
  ProvisioningJob,
  ProvisioningResult,
  ProvisioningRunRecord,
  ResultStatus,
  TokenKind,
} from '../types/provisioning.js';
import { TOKEN_KINDS } from '../types/provisioning.js';
import type { BrowserSessionController } from './browser-session.js';
import type { ConsolePage } from './console-page.js';
import type { CredentialStore } from './credential-store.js';
import { LoginStateMachine, type CodeSource, type LoginSettleTimes } from './login-state-machine.js';
import { MailboxPoller } from './mailbox-poller.js';
import { ProvisioningWizard, type WizardResult, type WizardSettleTimes } from './provisioning-wizard.js';
import type { StrategyTable } from './strategy-table.js';
import type { TokenInterceptor } from './token-interceptor.js';
import {
  JobAbortedError,
  JobTimeoutError,
  ProvisioningError,
  toProvisioningError,
} from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';
import { TIMEOUTS, withTimeout } from '../utils/timeouts.js';

// ============================================
// JOB STATUS
// ============================================

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['authenticating', 'failed'],
  authenticating: ['awaiting_mfa', 'capturing', 'failed'],
  awaiting_mfa: ['capturing', 'failed'],
  capturing: ['provisioning', 'persisting', 'failed'],
  provisioning: ['persisting', 'failed'],
  persisting: ['completed', 'failed'],
  completed: [],
  failed: [],
};

export class IllegalTransitionError extends Error {
  constructor(from: JobStatus, to: JobStatus) {
    super(`Illegal job status transition ${from} → ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

// ============================================
// ORCHESTRATOR
// ============================================

export interface OrchestratorDependencies {
  sessions: BrowserSessionController;
  store: CredentialStore;
  strategies: StrategyTable;
  /** Defaults to an IMAP MailboxPoller on the job's mailbox settings */
  codeSourceFactory?: (job: ProvisioningJob, config: JobConfig) => CodeSource;
  idFactory?: () => string;
  now?: () => Date;
  /** Step budgets and pauses; tests shorten them. The OTP polling window is added to loginStepMs. */
  loginStepMs?: number;
  wizardStepMs?: number;
  loginSettle?: Partial<LoginSettleTimes>;
  wizardSettle?: Partial<WizardSettleTimes>;
}

export interface RunOptions {
  jobId?: string;
  signal?: AbortSignal;
  /** Called after every status change */
  onStatus?: (job: Readonly<ProvisioningJob>) => void;
}

const LIVE_KINDS: readonly TokenKind[] = ['bearer', 'session'];

interface RunState {
  interceptor: TokenInterceptor | null;
  authenticated: boolean;
  wizard: WizardResult | null;
  failure: ProvisioningError | null;
}

export class ProvisioningOrchestrator {
  private readonly now: () => Date;
  private readonly idFactory: () => string;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.now = deps.now ?? (() => new Date());
    this.idFactory = deps.idFactory ?? randomUUID;
  }

  async run(config: JobConfig, options: RunOptions = {}): Promise<ProvisioningResult> {
    const job: ProvisioningJob = {
      id: options.jobId ?? this.idFactory(),
      tenantId: config.tenantId,
      loginIdentity: config.loginIdentity,
      targetTenantHandle: config.targetTenantHandle,
      scopeSet: [...config.scopeSet],
      flavor: config.flavor,
      status: 'pending',
      createdAt: this.now(),
    };
    const log = logger.orchestrator.child({ jobId: job.id, tenantId: job.tenantId });
    const startTime = Date.now();
    const warnings: string[] = [];

    const transition = (next: JobStatus) => {
      if (!canTransition(job.status, next)) {
        throw new IllegalTransitionError(job.status, next);
      }
      log.debug('Job status', { from: job.status, to: next });
      job.status = next;
      options.onStatus?.({ ...job });
    };

    log.info('Job started', { flavor: job.flavor, scopes: job.scopeSet.length, timeoutMs: config.timeoutMs });

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new JobTimeoutError(config.timeoutMs)), config.timeoutMs);
    const forwardAbort = () => controller.abort(new JobAbortedError());
    if (options.signal?.aborted) {
      forwardAbort();
    } else {
      options.signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    // Written from inside the session callback
    const state: RunState = { interceptor: null, authenticated: false, wizard: null, failure: null };

    try {
      await this.deps.sessions.withSession(
        job.id,
        async (session) => {
          state.interceptor = session.interceptor;
          transition('authenticating');

          const machine = new LoginStateMachine({
            page: session.page,
            strategies: this.deps.strategies.actions,
            codeSource: this.codeSourceFor(job, config),
            credentials: { jobId: job.id, loginIdentity: config.loginIdentity, loginSecret: config.loginSecret },
            target: config.console,
            otp: { maxAttempts: config.mailbox.maxAttempts, intervalMs: config.mailbox.pollIntervalMs },
            signal: controller.signal,
            settle: this.deps.loginSettle,
            onStateChange: (loginState) => {
              if (loginState === 'MFA_CHALLENGE' && job.status === 'authenticating') {
                transition('awaiting_mfa');
              }
            },
          });
          const login = await withTimeout('login', loginStepBudget(config.mailbox, this.deps.loginStepMs), machine.run());
          if (login.state === 'FAILED') {
            state.failure = login.error;
            return;
          }
          state.authenticated = true;
          transition('capturing');

          await this.captureFromStorage(session.interceptor, session.page, warnings, log);

          if (job.flavor === 'full') {
            transition('provisioning');
            const driver = new ProvisioningWizard({
              jobId: job.id,
              page: session.page,
              strategies: this.deps.strategies.actions,
              interceptor: session.interceptor,
              integrationsUrl: config.console.integrationsUrl,
              integrationName: config.integrationName,
              scopes: config.scopeSet,
              tokenPrefix: config.console.integrationTokenPrefix,
              tokenMinLength: config.console.integrationTokenMinLength,
              signal: controller.signal,
              settle: this.deps.wizardSettle,
            });
            const wizard = await withTimeout('wizard', this.deps.wizardStepMs ?? TIMEOUTS.WIZARD_STEP, driver.run());
            state.wizard = wizard;
            if (wizard.error) {
              warnings.push(`Integration not minted at ${wizard.failedStep ?? 'unknown step'}: ${wizard.error.message}`);
            }
          }
        },
        { signal: controller.signal }
      );
    } catch (error) {
      const reason: unknown = controller.signal.aborted ? controller.signal.reason : error;
      state.failure = toProvisioningError(reason);
      log.warn('Job interrupted', { reason: state.failure.reason, message: state.failure.message, status: job.status });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', forwardAbort);
      // Stops anything still polling after the session is gone
      if (!controller.signal.aborted) {
        controller.abort(new JobAbortedError('Job finished'));
      }
    }

    const tokens: CapturedTokenSet = state.interceptor?.capturedTokens() ?? {};
    const outcome = decideOutcome(job.flavor, state.authenticated, tokens);
    const { failure, wizard: finishedWizard } = state;

    let persisted = false;
    if (outcome !== 'failed') {
      transition('persisting');
      persisted = await this.persist(job, tokens, warnings, log);
    }
    transition(outcome === 'failed' ? 'failed' : 'completed');

    if (outcome !== 'failed' && failure) {
      warnings.push(failure.message);
    }

    const cause = failure ?? finishedWizard?.error ?? null;
    const error =
      outcome === 'failed'
        ? describeFailure(cause)
        : cause
          ? { code: cause.reason, message: cause.message }
          : undefined;

    const result: ProvisioningResult = {
      jobId: job.id,
      tenantId: job.tenantId,
      status: outcome,
      captured: tokenValues(tokens),
      missing: expectedKinds(job.flavor).filter((kind) => !tokens[kind]),
      expiresAt: tokens.bearer?.expiresAt ?? tokens.session?.expiresAt,
      skippedScopes: finishedWizard?.skippedScopes ?? [],
      extraction: finishedWizard?.extraction ?? undefined,
      persisted,
      warnings,
      error,
      durationMs: Date.now() - startTime,
    };

    await this.archive(job, result, log);

    log.info('Job finished', {
      status: result.status,
      capturedKinds: Object.keys(result.captured),
      missing: result.missing,
      skippedScopes: result.skippedScopes.length,
      reason: result.error?.code,
      durationMs: result.durationMs,
    });
    return result;
  }

  private codeSourceFor(job: ProvisioningJob, config: JobConfig): CodeSource {
    if (this.deps.codeSourceFactory) {
      return this.deps.codeSourceFactory(job, config);
    }
    return new MailboxPoller({ settings: config.mailbox, jobId: job.id });
  }

  /**
   * Fills token kinds live interception left empty; a refresh token only ever comes from here.
   */
  private async captureFromStorage(
    interceptor: TokenInterceptor,
    page: ConsolePage,
    warnings: string[],
    log: Logger
  ): Promise<void> {
    const live = interceptor.capturedLive();
    try {
      const found = interceptor.scrapeStorage(await page.readStorage());
      if (!live) {
        log.info('No token seen on the wire; used storage fallback', { recovered: found });
      }
    } catch (error) {
      if (error instanceof ProvisioningError && error.reason === 'fatal_environment') {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      warnings.push(`Browser storage could not be read: ${message}`);
      log.warn('Storage scrape failed', { message });
    }
  }

  private async persist(
    job: ProvisioningJob,
    tokens: CapturedTokenSet,
    warnings: string[],
    log: Logger
  ): Promise<boolean> {
    const update: CredentialUpdate = {
      bearer: tokens.bearer?.value,
      session: tokens.session?.value,
      integration: tokens.integration?.value,
      refresh: tokens.refresh?.value,
      expiresAt: tokens.bearer?.expiresAt,
      sessionExpiresAt: tokens.session?.expiresAt,
    };
    try {
      await this.deps.store.upsert(job.tenantId, update);
      return true;
    } catch (error) {
      const failure = toProvisioningError(error);
      warnings.push(`Credentials not persisted: ${failure.message}`);
      log.warn('Persistence failed; returning tokens anyway', { reason: failure.reason });
      return false;
    }
  }

  private async archive(job: ProvisioningJob, result: ProvisioningResult, log: Logger): Promise<void> {
    const record: ProvisioningRunRecord = {
      jobId: job.id,
      tenantId: job.tenantId,
      flavor: job.flavor,
      finalStatus: job.status,
      outcome: result.status,
      reason: result.error?.code ?? null,
      capturedKinds: TOKEN_KINDS.filter((kind) => result.captured[kind] !== undefined),
      missingKinds: result.missing,
      skippedScopes: result.skippedScopes,
      startedAt: job.createdAt,
      finishedAt: this.now(),
    };
    try {
      await this.deps.store.archiveRun(record);
    } catch (error) {
      result.warnings.push('Run record not archived');
      log.warn('Run archive failed', { message: error instanceof Error ? error.message : String(error) });
    }
  }
}

// ============================================
// OUTCOME
// ============================================

export function expectedKinds(flavor: JobConfig['flavor']): TokenKind[] {
  return flavor === 'full' ? ['bearer', 'session', 'integration'] : ['bearer', 'session'];
}

/**
 * Form and MFA handling plus the whole OTP polling window.
 */
export function loginStepBudget(
  otp: Pick<JobConfig['mailbox'], 'maxAttempts' | 'pollIntervalMs'>,
  baseMs: number = TIMEOUTS.LOGIN_STEP
): number {
  return baseMs + otp.maxAttempts * otp.pollIntervalMs;
}

export function decideOutcome(
  flavor: JobConfig['flavor'],
  authenticated: boolean,
  tokens: CapturedTokenSet
): ResultStatus {
  if (!authenticated) {
    return 'failed';
  }
  const live = LIVE_KINDS.some((kind) => tokens[kind] !== undefined);
  if (flavor === 'token-refresh') {
    return live ? 'completed' : 'failed';
  }
  const integration = tokens.integration !== undefined;
  if (live && integration) {
    return 'completed';
  }
  return live || integration ? 'partial' : 'failed';
}

function tokenValues(tokens: CapturedTokenSet): Partial<Record<TokenKind, string>> {
  const values: Partial<Record<TokenKind, string>> = {};
  for (const kind of TOKEN_KINDS) {
    const token = tokens[kind];
    if (token) {
      values[kind] = token.value;
    }
  }
  return values;
}

function describeFailure(cause: ProvisioningError | null): { code: ProvisioningError['reason']; message: string } {
  if (cause) {
    return { code: cause.reason, message: cause.message };
  }
  return { code: 'unexpected', message: 'Authenticated but no token was captured' };
}
