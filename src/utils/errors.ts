/**
 * Error taxonomy for provisioning jobs.
 *
 * Every failure that leaves a step is one of these classes, so callers branch
 * on `reason` and `retryable` instead of parsing messages. `PartialCapture`
 * is deliberately absent: a partial result is a successful outcome with
 * `status: 'partial'`, not an exception.
 */

import type { z } from 'zod';
import { formatConfigErrors } from './config-schemas.js';

/**
 * Job-level reason codes reported in results and run records
 */
export const REASON_CODES = [
  'fatal_environment',
  'transient_ui',
  'ui_exhausted',
  'otp_timeout',
  'login_failed',
  'login_loop',
  'unrecognized_page',
  'integration_not_extracted',
  'persistence_failure',
  'job_timeout',
  'config_invalid',
  'aborted',
  'pool_rejected',
  'unexpected',
] as const;

export type ReasonCode = (typeof REASON_CODES)[number];

export class ProvisioningError extends Error {
  constructor(
    message: string,
    public readonly reason: ReasonCode,
    public readonly retryable: boolean,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProvisioningError';
  }
}

/**
 * The browser process or its runtime cannot start. Never retried.
 */
export class FatalEnvironmentError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'fatal_environment', false, options);
    this.name = 'FatalEnvironmentError';
  }
}

/**
 * One UI action failed after every strategy and every round.
 */
export class TransientUiError extends ProvisioningError {
  constructor(
    message: string,
    public readonly action: string,
    public readonly triedStrategies: string[],
    reason: ReasonCode = 'ui_exhausted'
  ) {
    super(message, reason, true);
    this.name = 'TransientUiError';
  }
}

/**
 * No OTP arrived within the polling bound. The job can be re-run safely.
 */
export class OtpTimeoutError extends ProvisioningError {
  constructor(
    public readonly attempts: number,
    public readonly intervalMs: number
  ) {
    super(`No verification code arrived after ${attempts} mailbox checks`, 'otp_timeout', true);
    this.name = 'OtpTimeoutError';
  }
}

export class LoginFailedError extends ProvisioningError {
  constructor(message: string, reason: 'login_failed' | 'login_loop' | 'unrecognized_page' = 'login_failed') {
    super(message, reason, true);
    this.name = 'LoginFailedError';
  }
}

/**
 * Credential store write failed. Reported as a warning only.
 */
export class PersistenceFailureError extends ProvisioningError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'persistence_failure', true, options);
    this.name = 'PersistenceFailureError';
  }
}

export class JobTimeoutError extends ProvisioningError {
  constructor(public readonly timeoutMs: number) {
    super(`Job exceeded its ${timeoutMs}ms budget`, 'job_timeout', true);
    this.name = 'JobTimeoutError';
  }
}

export class StepTimeoutError extends ProvisioningError {
  constructor(
    public readonly step: string,
    public readonly timeoutMs: number
  ) {
    super(`Step "${step}" exceeded ${timeoutMs}ms`, 'transient_ui', true);
    this.name = 'StepTimeoutError';
  }
}

export class JobAbortedError extends ProvisioningError {
  constructor(message = 'Job was aborted') {
    super(message, 'aborted', true);
    this.name = 'JobAbortedError';
  }
}

/**
 * Configuration validation error with a per-field list of problems.
 */
export class ConfigValidationError extends ProvisioningError {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
        `Please check your environment variables or configuration file.`,
      'config_invalid',
      false
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Normalize anything thrown into a ProvisioningError so results always carry a reason code.
 */
export function toProvisioningError(error: unknown): ProvisioningError {
  if (error instanceof ProvisioningError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ProvisioningError(message, 'unexpected', true, { cause: error });
}
