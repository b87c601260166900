/**
 * Login State Machine
 *
 *   LOGIN_FORM ──submit──▶ MFA_CHALLENGE ──code──▶ AUTHENTICATED
 *        │                       │
 *        └──────────▶ FAILED ◀───┘
 *
 * The current state is read from the page on every step, not remembered: a
 * password field means LOGIN_FORM, a code widget means MFA_CHALLENGE, and
 * otherwise a URL only an authenticated session reaches means AUTHENTICATED.
 * A page that matches none of these is still loading and is probed again a
 * bounded number of times. The total number of transitions is bounded too, so
 * a console that keeps bouncing back to the login form fails as `login_loop`.
 */

import type { ConsoleTarget, OtpChallenge } from '../types/provisioning.js';
import type { ConsolePage } from './console-page.js';
import type { StrategyTable } from './strategy-table.js';
import {
  anyPresent,
  clickAction,
  fillAction,
  ok,
  resolveAndAct,
  resolveOrThrow,
  retryable,
  type StrategyAction,
} from './retry-orchestrator.js';
import {
  FatalEnvironmentError,
  LoginFailedError,
  OtpTimeoutError,
  ProvisioningError,
  toProvisioningError,
  type ReasonCode,
} from '../utils/errors.js';
import { logger, type Logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';

export type LoginState = 'LOGIN_FORM' | 'MFA_CHALLENGE' | 'AUTHENTICATED' | 'FAILED';

type CodeEntryMode = 'single' | 'per-digit';

/**
 * Anything that can wait for a verification code; MailboxPoller in production.
 */
export interface CodeSource {
  awaitCode(sentAfter: Date, options: { maxAttempts: number; intervalMs: number; signal?: AbortSignal }): Promise<string | null>;
}

export interface LoginCredentials {
  jobId: string;
  loginIdentity: string;
  loginSecret: string;
}

export interface LoginMachineOptions {
  page: ConsolePage;
  strategies: StrategyTable['actions'];
  codeSource: CodeSource;
  credentials: LoginCredentials;
  target: Pick<ConsoleTarget, 'loginUrl' | 'authenticatedPattern'>;
  otp: { maxAttempts: number; intervalMs: number };
  signal?: AbortSignal;
  onStateChange?: (state: LoginState) => void;
  /** Upper bound on state transitions before giving up as a loop */
  maxTransitions?: number;
  /** Re-probes of a page that matches no known state */
  maxProbes?: number;
  /** Pauses; tests shorten them */
  settle?: Partial<LoginSettleTimes>;
  now?: () => Date;
}

export interface LoginSettleTimes {
  afterSubmit: number;
  afterSendCode: number;
  afterCodeEntry: number;
  betweenDigits: number;
  betweenProbes: number;
  /** Backoff between locator rounds */
  retryBackoff: number;
}

const DEFAULT_SETTLE: LoginSettleTimes = {
  afterSubmit: TIMEOUTS.LOGIN_SETTLE,
  afterSendCode: TIMEOUTS.OTP_SEND_SETTLE,
  afterCodeEntry: TIMEOUTS.OTP_SUBMIT_SETTLE,
  betweenDigits: TIMEOUTS.OTP_DIGIT_DELAY,
  betweenProbes: TIMEOUTS.PROBE_INTERVAL,
  retryBackoff: TIMEOUTS.LOCATOR_ROUND_BACKOFF,
};

export type LoginResult =
  | {
      state: 'AUTHENTICATED';
      transitions: number;
      challenge: OtpChallenge | null;
      finalUrl: string;
    }
  | {
      state: 'FAILED';
      reason: ReasonCode;
      error: ProvisioningError;
      transitions: number;
      challenge: OtpChallenge | null;
    };

export class LoginStateMachine {
  private readonly page: ConsolePage;
  private readonly strategies: StrategyTable['actions'];
  private readonly settle: LoginSettleTimes;
  private readonly maxTransitions: number;
  private readonly maxProbes: number;
  private readonly now: () => Date;
  private readonly log: Logger;
  private challenge: OtpChallenge | null = null;
  private transitions = 0;

  constructor(private readonly options: LoginMachineOptions) {
    this.page = options.page;
    this.strategies = options.strategies;
    this.settle = { ...DEFAULT_SETTLE, ...options.settle };
    this.maxTransitions = options.maxTransitions ?? 6;
    this.maxProbes = options.maxProbes ?? 5;
    this.now = options.now ?? (() => new Date());
    this.log = logger.login.child({ jobId: options.credentials.jobId });
  }

  /**
   * Drive the console from its login page to an authenticated page.
   * Never throws for step failures; they come back as FAILED with a reason.
   * An abort is rethrown so the caller's teardown runs.
   */
  async run(): Promise<LoginResult> {
    try {
      return await this.drive();
    } catch (error) {
      if (this.options.signal?.aborted) {
        throw error;
      }
      const failure = toProvisioningError(error);
      return this.fail(failure);
    }
  }

  private async drive(): Promise<LoginResult> {
    await this.openLoginPage();

    while (this.transitions < this.maxTransitions) {
      const next = await this.classify();
      if (next === null) {
        return this.fail(new LoginFailedError(`Page at ${this.page.url()} matches no known login state`, 'unrecognized_page'));
      }

      this.enter(next);

      if (next === 'AUTHENTICATED') {
        this.log.info('Authenticated', { transitions: this.transitions, url: this.page.url() });
        return {
          state: 'AUTHENTICATED',
          transitions: this.transitions,
          challenge: this.challenge,
          finalUrl: this.page.url(),
        };
      }

      if (next === 'LOGIN_FORM') {
        await this.submitLoginForm();
        continue;
      }

      const accepted = await this.answerChallenge();
      if (!accepted) {
        return this.fail(new OtpTimeoutError(this.options.otp.maxAttempts, this.options.otp.intervalMs));
      }
    }

    return this.fail(
      new LoginFailedError(`Login did not settle after ${this.maxTransitions} transitions`, 'login_loop')
    );
  }

  private enter(state: LoginState): void {
    this.transitions++;
    this.log.debug('Login state', { state, transition: this.transitions });
    this.options.onStateChange?.(state);
  }

  private fail(error: ProvisioningError): LoginResult {
    this.log.warn('Login failed', { reason: error.reason, message: error.message, transitions: this.transitions });
    this.options.onStateChange?.('FAILED');
    return {
      state: 'FAILED',
      reason: error.reason,
      error,
      transitions: this.transitions,
      challenge: this.challenge,
    };
  }

  private async openLoginPage(): Promise<void> {
    try {
      await this.page.goto(this.options.target.loginUrl, {
        waitUntil: 'domcontentloaded',
        timeout: TIMEOUTS.PAGE_LOAD,
      });
    } catch (error) {
      if (error instanceof FatalEnvironmentError) {
        throw error;
      }
      throw new ProvisioningError(`Could not open ${this.options.target.loginUrl}`, 'transient_ui', true, {
        cause: error,
      });
    }
  }

  /**
   * Probe the DOM for the current state, re-probing while the page is unsettled.
   */
  async classify(): Promise<Exclude<LoginState, 'FAILED'> | null> {
    for (let probe = 1; probe <= this.maxProbes; probe++) {
      if (this.options.signal?.aborted) {
        throw this.options.signal.reason;
      }
      if (await anyPresent(this.page, this.strategies['probe.loginForm'])) {
        return 'LOGIN_FORM';
      }
      if (await anyPresent(this.page, this.strategies['probe.mfaChallenge'])) {
        return 'MFA_CHALLENGE';
      }
      if (this.options.target.authenticatedPattern.test(this.page.url())) {
        return 'AUTHENTICATED';
      }
      this.log.debug('Page not settled yet', { probe, url: this.page.url() });
      if (probe < this.maxProbes) {
        await this.page.pause(this.settle.betweenProbes);
      }
    }
    return null;
  }

  private async submitLoginForm(): Promise<void> {
    const { loginIdentity, loginSecret } = this.options.credentials;
    const resolveOptions = { signal: this.options.signal, backoffMs: this.settle.retryBackoff };

    await resolveOrThrow(this.page, 'login.identity', this.strategies['login.identity'], fillAction(loginIdentity), resolveOptions);
    await resolveOrThrow(this.page, 'login.secret', this.strategies['login.secret'], fillAction(loginSecret), resolveOptions);
    await resolveOrThrow(this.page, 'login.submit', this.strategies['login.submit'], clickAction(), resolveOptions);

    this.log.info('Credentials submitted');
    await this.page.pause(this.settle.afterSubmit);
    await this.waitForLoad();
  }

  /**
   * Returns false when no code arrived within the polling bound.
   */
  private async answerChallenge(): Promise<boolean> {
    const sentAt = this.now();
    this.challenge = {
      jobId: this.options.credentials.jobId,
      sentAt,
      code: null,
      consumed: false,
      expired: false,
    };

    // Some consoles send the code on their own; a missing button is fine
    const sent = await resolveAndAct(this.page, 'mfa.sendCode', this.strategies['mfa.sendCode'], clickAction(), {
      maxRounds: 1,
      perTryTimeoutMs: TIMEOUTS.LOCATOR_TRY / 2,
      signal: this.options.signal,
    });
    if (!sent.ok && sent.fatal) {
      throw sent.error;
    }
    this.log.info(sent.ok ? 'Requested verification code' : 'No send-code control; waiting for code', {
      strategy: sent.ok ? sent.strategy : undefined,
    });
    await this.page.pause(this.settle.afterSendCode);

    const code = await this.options.codeSource.awaitCode(sentAt, {
      maxAttempts: this.options.otp.maxAttempts,
      intervalMs: this.options.otp.intervalMs,
      signal: this.options.signal,
    });

    if (code === null) {
      this.challenge.expired = true;
      return false;
    }
    this.challenge.code = code;

    const mode = await resolveOrThrow(this.page, 'mfa.code', this.strategies['mfa.code'], this.enterCode(code), {
      signal: this.options.signal,
      backoffMs: this.settle.retryBackoff,
    });
    this.challenge.consumed = true;

    if (mode === 'single') {
      const submitted = await resolveAndAct(this.page, 'mfa.submit', this.strategies['mfa.submit'], clickAction(), {
        maxRounds: 1,
        perTryTimeoutMs: TIMEOUTS.LOCATOR_TRY / 2,
        signal: this.options.signal,
      });
      if (!submitted.ok && submitted.fatal) {
        throw submitted.error;
      }
    }

    this.log.info('Verification code entered', { mode });
    await this.page.pause(this.settle.afterCodeEntry);
    await this.waitForLoad();
    return true;
  }

  private enterCode(code: string): StrategyAction<CodeEntryMode> {
    return async ({ element, matches, strategy }) => {
      if (strategy.mode !== 'per-digit') {
        await element.fill(code, { timeout: TIMEOUTS.LOCATOR_TRY });
        return ok<CodeEntryMode>('single');
      }

      const fields = await matches.count();
      if (fields < code.length) {
        return retryable(`${fields} digit fields for a ${code.length}-digit code`);
      }
      for (let i = 0; i < code.length; i++) {
        const field = matches.nth(i);
        await field.click({ timeout: TIMEOUTS.LOCATOR_TRY });
        await field.fill(code.charAt(i), { timeout: TIMEOUTS.LOCATOR_TRY });
        await this.page.pause(this.settle.betweenDigits);
      }
      return ok<CodeEntryMode>('per-digit');
    };
  }

  private async waitForLoad(): Promise<void> {
    try {
      await this.page.waitForLoadState('domcontentloaded', TIMEOUTS.NETWORK_IDLE);
    } catch (error) {
      // The next probe decides whether the page is usable
      this.log.debug('Load state wait timed out', { errorName: error instanceof Error ? error.name : typeof error });
    }
  }
}
