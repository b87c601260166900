/**
 * Credential Provisioner
 *
 * Drives a third-party console in a headless browser to obtain a tenant's
 * credentials: logs in (answering the email one-time code), captures the
 * session tokens the console sends, mints a scoped integration token through
 * the console's own UI and persists everything per tenant.
 *
 * Programmatic entry point. `ProvisioningService.fromEnvironment()` builds the
 * production stack; the lower-level pieces are exported for embedding and tests.
 */

export * from './types/index.js';
export * from './utils/index.js';

export { ProvisioningService, buildJobConfig, type ProvisionRequest, type JobConfigSources } from './core/provisioning-service.js';
export {
  ProvisioningOrchestrator,
  IllegalTransitionError,
  canTransition,
  decideOutcome,
  expectedKinds,
  type OrchestratorDependencies,
  type RunOptions,
} from './core/provisioning-orchestrator.js';
export { JobPool, JobQueueFullError, JobQueueTimeoutError, JobPoolClosedError, DEFAULT_POOL_LIMITS } from './core/job-pool.js';
export type { JobPoolLimits, JobPoolStats } from './core/job-pool.js';
export { BrowserSessionController, type BrowserSession, type SessionControllerOptions } from './core/browser-session.js';
export { PlaywrightLauncher, LAUNCH_ARGS, getPlaywrightError, type BrowserLaunchConfig } from './core/browser-manager.js';
export type {
  BrowserLauncher,
  ConsolePage,
  ElementProbe,
  IsolatedContext,
  LaunchedBrowser,
  LoadState,
  StorageSnapshot,
  TappedPage,
} from './core/console-page.js';
export { LoginStateMachine, type CodeSource, type LoginResult, type LoginState } from './core/login-state-machine.js';
export {
  MailboxPoller,
  ImapFlowTransport,
  ConsumedMessageRegistry,
  extractOtp,
  htmlToText,
  OTP_PATTERNS,
  type MailboxTransport,
  type MailMessage,
} from './core/mailbox-poller.js';
export { TokenInterceptor, DEFAULT_HEADER_RULES, type HeaderRule } from './core/token-interceptor.js';
export { ProvisioningWizard, type WizardResult, type WizardStep } from './core/provisioning-wizard.js';
export { resolveAndAct, resolveOrThrow, anyPresent, clickAction, fillAction, type ResolveResult } from './core/retry-orchestrator.js';
export {
  loadStrategyTable,
  parseStrategyTable,
  loadDefaultScopes,
  forScope,
  type StrategyTable,
  type SelectorStrategy,
  type ActionName,
} from './core/strategy-table.js';
export { inspectJwt, remainingLifetimeMs, looksLikeJwt, type JwtTiming } from './core/jwt-inspector.js';
export { SqliteCredentialStore, MemoryCredentialStore, type CredentialStore } from './core/credential-store.js';
