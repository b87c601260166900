/**
 * Retry Orchestrator - resolves one logical UI action over ordered locator strategies
 *
 * A round tries every strategy once: wait for the element, then act on it.
 * When every strategy in a round fails, the orchestrator backs off and starts
 * the next round. After `maxRounds` it returns a definitive failure naming
 * every strategy it tried.
 *
 * Actions report a typed outcome instead of throwing. Anything an action does
 * throw (a Playwright timeout, a detached element) counts as retryable unless
 * it is a FatalEnvironmentError; error messages are never inspected.
 */

import type { ConsolePage, ElementProbe } from './console-page.js';
import type { SelectorStrategy } from './strategy-table.js';
import { FatalEnvironmentError, ProvisioningError, TransientUiError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { sleep } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';

const log = logger.locator;

// ============================================
// OUTCOMES
// ============================================

export type StepOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'retryable'; reason: string }
  | { kind: 'fatal'; error: ProvisioningError };

export function ok<T>(value: T): StepOutcome<T> {
  return { kind: 'ok', value };
}

export function retryable<T = never>(reason: string): StepOutcome<T> {
  return { kind: 'retryable', reason };
}

export function fatal<T = never>(error: ProvisioningError): StepOutcome<T> {
  return { kind: 'fatal', error };
}

/**
 * What an action receives for the strategy being tried
 */
export interface StrategyTarget {
  /** First visible match */
  element: ElementProbe;
  /** Every match, for actions that span several fields (per-digit code entry) */
  matches: ElementProbe;
  strategy: SelectorStrategy;
}

export type StrategyAction<T> = (target: StrategyTarget) => Promise<StepOutcome<T>>;

export interface ResolveOptions {
  /** Wait-then-act budget for one strategy */
  perTryTimeoutMs?: number;
  maxRounds?: number;
  /** Pause between rounds */
  backoffMs?: number;
  /** Element state to wait for before acting */
  waitState?: 'visible' | 'attached';
  signal?: AbortSignal;
}

export type ResolveResult<T> =
  | { ok: true; value: T; strategy: string; round: number; attempts: number }
  | {
      ok: false;
      fatal: boolean;
      error: ProvisioningError;
      tried: string[];
      attempts: number;
    };

const DEFAULTS = {
  perTryTimeoutMs: TIMEOUTS.LOCATOR_TRY,
  maxRounds: 3,
  backoffMs: TIMEOUTS.LOCATOR_ROUND_BACKOFF,
  waitState: 'visible',
} as const;

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw signal.reason;
  }
}

/**
 * Try `strategies` in order, round after round, until `act` reports ok.
 *
 * Aborting the signal stops the loop by rethrowing the signal's reason.
 */
export async function resolveAndAct<T>(
  page: ConsolePage,
  actionName: string,
  strategies: readonly SelectorStrategy[],
  act: StrategyAction<T>,
  options: ResolveOptions = {}
): Promise<ResolveResult<T>> {
  const perTryTimeoutMs = options.perTryTimeoutMs ?? DEFAULTS.perTryTimeoutMs;
  const maxRounds = options.maxRounds ?? DEFAULTS.maxRounds;
  const backoffMs = options.backoffMs ?? DEFAULTS.backoffMs;
  const waitState = options.waitState ?? DEFAULTS.waitState;
  const tried = strategies.map((strategy) => strategy.name);
  let attempts = 0;

  for (let round = 1; round <= maxRounds; round++) {
    for (const strategy of strategies) {
      throwIfAborted(options.signal);
      attempts++;

      let outcome: StepOutcome<T>;
      try {
        const matches = page.locator(strategy.selector);
        const element = matches.first();
        await element.waitFor({ state: waitState, timeout: perTryTimeoutMs });
        outcome = await act({ element, matches, strategy });
      } catch (error) {
        if (error instanceof FatalEnvironmentError) {
          outcome = fatal(error);
        } else {
          outcome = retryable(error instanceof Error ? error.name : 'thrown');
        }
      }

      if (outcome.kind === 'ok') {
        log.debug('Action resolved', { action: actionName, strategy: strategy.name, round, attempt: attempts });
        return { ok: true, value: outcome.value, strategy: strategy.name, round, attempts };
      }

      if (outcome.kind === 'fatal') {
        log.error('Action hit a fatal error', {
          action: actionName,
          strategy: strategy.name,
          error: outcome.error,
        });
        return { ok: false, fatal: true, error: outcome.error, tried, attempts };
      }

      log.debug('Strategy failed', {
        action: actionName,
        strategy: strategy.name,
        round,
        reason: outcome.reason,
      });
    }

    if (round < maxRounds) {
      await sleep(backoffMs, options.signal);
    }
  }

  log.warn('Action exhausted every strategy', { action: actionName, tried, rounds: maxRounds, attempts });
  return {
    ok: false,
    fatal: false,
    error: new TransientUiError(
      `No strategy for "${actionName}" succeeded after ${maxRounds} round(s)`,
      actionName,
      tried
    ),
    tried,
    attempts,
  };
}

/**
 * resolveAndAct for callers that treat failure as an exception.
 */
export async function resolveOrThrow<T>(
  page: ConsolePage,
  actionName: string,
  strategies: readonly SelectorStrategy[],
  act: StrategyAction<T>,
  options: ResolveOptions = {}
): Promise<T> {
  const result = await resolveAndAct(page, actionName, strategies, act, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

// ============================================
// COMMON ACTIONS
// ============================================

export function clickAction(timeoutMs: number = TIMEOUTS.LOCATOR_TRY): StrategyAction<void> {
  return async ({ element }) => {
    await element.click({ timeout: timeoutMs });
    return ok(undefined);
  };
}

export function fillAction(value: string, timeoutMs: number = TIMEOUTS.LOCATOR_TRY): StrategyAction<void> {
  return async ({ element }) => {
    await element.fill(value, { timeout: timeoutMs });
    return ok(undefined);
  };
}

/**
 * Single-pass presence check across strategies. Used for page classification,
 * where "not there" is an answer rather than a failure.
 */
export async function anyPresent(page: ConsolePage, strategies: readonly SelectorStrategy[]): Promise<string | null> {
  for (const strategy of strategies) {
    const matches = page.locator(strategy.selector);
    if ((await matches.count()) > 0 && (await matches.first().isVisible())) {
      return strategy.name;
    }
  }
  return null;
}
