/**
 * Provisioning domain types
 */

import type { ReasonCode } from '../utils/errors.js';

// ============================================
// JOBS
// ============================================

/**
 * Which parts of the pipeline a job runs. `full` mints an integration token;
 * `token-refresh` only logs in and recaptures the short-lived tokens.
 */
export const PROVISIONING_FLAVORS = ['full', 'token-refresh'] as const;

export type ProvisioningFlavor = (typeof PROVISIONING_FLAVORS)[number];

export const JOB_STATUSES = [
  'pending',
  'authenticating',
  'awaiting_mfa',
  'capturing',
  'provisioning',
  'persisting',
  'completed',
  'failed',
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export interface ProvisioningJob {
  id: string;
  tenantId: string;
  loginIdentity: string;
  targetTenantHandle: string;
  scopeSet: string[];
  flavor: ProvisioningFlavor;
  status: JobStatus;
  createdAt: Date;
}

/**
 * Mailbox settings a job polls for its verification code
 */
export interface MailboxSettings {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  password: string;
  mailbox: string;
  sender?: string;
  subject?: string;
  maxAttempts: number;
  pollIntervalMs: number;
  clockSkewMs: number;
}

/**
 * Target console endpoints and token plausibility rules
 */
export interface ConsoleTarget {
  loginUrl: string;
  integrationsUrl: string;
  /** Matches URLs that only an authenticated session reaches */
  authenticatedPattern: RegExp;
  integrationTokenPrefix: string;
  integrationTokenMinLength: number;
}

/**
 * Everything one provisioning run needs, threaded end-to-end instead of
 * being read from ambient globals inside the pipeline.
 */
export interface JobConfig {
  tenantId: string;
  loginIdentity: string;
  loginSecret: string;
  targetTenantHandle: string;
  scopeSet: string[];
  integrationName: string;
  flavor: ProvisioningFlavor;
  console: ConsoleTarget;
  mailbox: MailboxSettings;
  timeoutMs: number;
}

// ============================================
// CAPTURED CREDENTIALS
// ============================================

export const TOKEN_KINDS = ['bearer', 'session', 'integration', 'refresh'] as const;

export type TokenKind = (typeof TOKEN_KINDS)[number];

export type TokenSource =
  | 'request-header'
  | 'storage'
  | 'result-dialog'
  | 'clipboard'
  | 'nearby-scan';

export interface CapturedToken {
  jobId: string;
  kind: TokenKind;
  value: string;
  source: TokenSource;
  capturedAt: Date;
  issuedAt?: Date;
  expiresAt?: Date;
}

export type CapturedTokenSet = Partial<Record<TokenKind, CapturedToken>>;

export interface OtpChallenge {
  jobId: string;
  sentAt: Date;
  code: string | null;
  consumed: boolean;
  expired: boolean;
}

// ============================================
// PERSISTENCE
// ============================================

export interface TenantCredentialRecord {
  tenantId: string;
  bearer: string | null;
  session: string | null;
  integration: string | null;
  refresh: string | null;
  expiresAt: Date | null;
  sessionExpiresAt: Date | null;
  updatedAt: Date;
}

/**
 * Partial update; fields left undefined keep their stored value.
 */
export interface CredentialUpdate {
  bearer?: string;
  session?: string;
  integration?: string;
  refresh?: string;
  expiresAt?: Date;
  sessionExpiresAt?: Date;
}

export const RESULT_STATUSES = ['completed', 'partial', 'failed'] as const;

export type ResultStatus = (typeof RESULT_STATUSES)[number];

export interface ProvisioningRunRecord {
  jobId: string;
  tenantId: string;
  flavor: ProvisioningFlavor;
  finalStatus: JobStatus;
  outcome: ResultStatus;
  reason: ReasonCode | null;
  capturedKinds: TokenKind[];
  missingKinds: TokenKind[];
  skippedScopes: string[];
  startedAt: Date;
  finishedAt: Date;
}

// ============================================
// RESULTS
// ============================================

export type IntegrationExtractionPath = 'result-dialog' | 'clipboard' | 'nearby-scan';

export interface ProvisioningResult {
  jobId: string;
  tenantId: string;
  status: ResultStatus;
  captured: Partial<Record<TokenKind, string>>;
  missing: TokenKind[];
  expiresAt?: Date;
  skippedScopes: string[];
  extraction?: IntegrationExtractionPath;
  persisted: boolean;
  warnings: string[];
  error?: {
    code: ReasonCode;
    message: string;
  };
  durationMs: number;
}
