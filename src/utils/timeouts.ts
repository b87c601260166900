/**
 * Central Timeout Configuration
 *
 * All timeout values should be imported from this module to ensure
 * consistent behavior across the pipeline.
 *
 * Timeout categories:
 * - PAGE: Navigation and load-state waits
 * - LOCATOR: Per-strategy wait-then-act attempts
 * - STEP: Budget for one state-machine step
 * - SETTLE: Fixed pauses after the console reacts to input
 * - JOB: The whole provisioning run
 */

import { StepTimeoutError } from './errors.js';

/**
 * Default timeout values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Full page navigation timeout
   */
  PAGE_LOAD: 30000,

  /**
   * Wait for network to go idle after navigation; the console keeps
   * long-polling so this is capped well below PAGE_LOAD
   */
  NETWORK_IDLE: 15000,

  /**
   * One wait-then-act attempt for a single locator strategy
   */
  LOCATOR_TRY: 5000,

  /**
   * Backoff between rounds of the retry orchestrator
   */
  LOCATOR_ROUND_BACKOFF: 2000,

  /**
   * Budget for the login form and MFA page handling; each job adds its
   * OTP polling window on top
   */
  LOGIN_STEP: 120000,

  /**
   * Budget for the whole provisioning wizard
   */
  WIZARD_STEP: 180000,

  /**
   * Pause after submitting credentials
   */
  LOGIN_SETTLE: 5000,

  /**
   * Pause after requesting the verification code before the first poll
   */
  OTP_SEND_SETTLE: 3000,

  /**
   * Pause after the OTP digits are entered
   */
  OTP_SUBMIT_SETTLE: 5000,

  /**
   * Pause between per-digit OTP keystrokes
   */
  OTP_DIGIT_DELAY: 150,

  /**
   * Interval between page-state probes while the console is still loading
   */
  PROBE_INTERVAL: 2000,

  /**
   * Pause after typing a scope so the dropdown can filter
   */
  SCOPE_FILTER_SETTLE: 500,

  /**
   * Wait for the scope chip to confirm acceptance
   */
  SCOPE_ACCEPT: 2000,

  /**
   * Pause after opening or submitting a wizard form
   */
  WIZARD_SETTLE: 3000,

  /**
   * Whole-job budget
   */
  JOB: 300000,
} as const;

/**
 * Run `work` under a step budget. The timer is always cleared; a timeout
 * rejects with StepTimeoutError while `work` is left to settle on its own.
 */
export async function withTimeout<T>(step: string, timeoutMs: number, work: Promise<T>): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new StepTimeoutError(step, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
