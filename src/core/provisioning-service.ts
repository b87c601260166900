/**
 * Provisioning Service - wires configuration, pool, orchestrator and store
 *
 * Turns a caller's request into a fully resolved JobConfig and runs it
 * through the job pool. This is the only place that reads the parsed
 * environment; everything below it receives its settings explicitly.
 */

import { randomUUID } from 'crypto';
import type {
  JobConfig,
  ProvisioningFlavor,
  ProvisioningResult,
  ProvisioningRunRecord,
  TenantCredentialRecord,
} from '../types/provisioning.js';
import { PlaywrightLauncher } from './browser-manager.js';
import { BrowserSessionController } from './browser-session.js';
import { SqliteCredentialStore, type CredentialStore } from './credential-store.js';
import { JobPool } from './job-pool.js';
import { ProvisioningOrchestrator } from './provisioning-orchestrator.js';
import { loadDefaultScopes, loadStrategyTable } from './strategy-table.js';
import type { BrowserConfig, ConsoleConfig, JobDefaults, MailboxConfig } from '../utils/config-schemas.js';
import {
  getBrowserConfig,
  getConsoleConfig,
  getJobDefaults,
  getMailboxConfig,
  getPoolConfig,
  getStoreConfig,
} from '../utils/env-parser.js';
import { ProvisioningError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.create('ProvisioningService');

export interface ProvisionRequest {
  tenantId: string;
  loginIdentity: string;
  targetTenantHandle: string;
  /** Falls back to CONSOLE_LOGIN_SECRET */
  loginSecret?: string;
  scopes?: string[];
  integrationName?: string;
  flavor?: ProvisioningFlavor;
}

export interface JobConfigSources {
  console: ConsoleConfig;
  mailbox: MailboxConfig;
  job: JobDefaults;
  defaultScopes: readonly string[];
}

/**
 * Resolve a request against configuration. Throws a config_invalid error
 * when no login secret is available.
 */
export function buildJobConfig(request: ProvisionRequest, sources: JobConfigSources): JobConfig {
  const loginSecret = request.loginSecret ?? sources.console.loginSecret;
  if (!loginSecret) {
    throw new ProvisioningError(
      'No login secret: pass one with the request or set CONSOLE_LOGIN_SECRET',
      'config_invalid',
      false
    );
  }

  const integrationsPath = sources.console.integrationsPath
    .split('{handle}')
    .join(encodeURIComponent(request.targetTenantHandle));
  const scopeSet = request.scopes?.length ? request.scopes : sources.job.scopes?.length ? sources.job.scopes : sources.defaultScopes;

  return {
    tenantId: request.tenantId,
    loginIdentity: request.loginIdentity,
    loginSecret,
    targetTenantHandle: request.targetTenantHandle,
    scopeSet: [...scopeSet],
    integrationName: request.integrationName ?? sources.job.integrationName,
    flavor: request.flavor ?? 'full',
    console: {
      loginUrl: new URL(sources.console.loginPath, sources.console.baseUrl).toString(),
      integrationsUrl: new URL(integrationsPath, sources.console.baseUrl).toString(),
      authenticatedPattern: new RegExp(sources.console.authenticatedPattern),
      integrationTokenPrefix: sources.console.tokenPrefix,
      integrationTokenMinLength: sources.console.tokenMinLength,
    },
    mailbox: { ...sources.mailbox },
    timeoutMs: sources.job.timeoutMs,
  };
}

export interface ProvisioningServiceOptions {
  orchestrator: ProvisioningOrchestrator;
  pool: JobPool;
  store: CredentialStore;
  sources: JobConfigSources;
}

export class ProvisioningService {
  private readonly orchestrator: ProvisioningOrchestrator;
  private readonly pool: JobPool;
  private readonly store: CredentialStore;
  private readonly sources: JobConfigSources;

  constructor(options: ProvisioningServiceOptions) {
    this.orchestrator = options.orchestrator;
    this.pool = options.pool;
    this.store = options.store;
    this.sources = options.sources;
  }

  /**
   * Build the production stack from validated environment configuration.
   */
  static fromEnvironment(overrides: Partial<Pick<BrowserConfig, 'headless'>> = {}): ProvisioningService {
    const browser = { ...getBrowserConfig(), ...overrides };
    const consoleConfig = getConsoleConfig();
    const store = new SqliteCredentialStore({ dbPath: getStoreConfig().dbPath });
    const sessions = new BrowserSessionController(new PlaywrightLauncher(browser), {
      screenshotDir: browser.screenshotDir,
    });
    const orchestrator = new ProvisioningOrchestrator({
      sessions,
      store,
      strategies: consoleConfig.strategyTablePath
        ? loadStrategyTable(consoleConfig.strategyTablePath)
        : loadStrategyTable(),
    });

    return new ProvisioningService({
      orchestrator,
      pool: new JobPool(getPoolConfig()),
      store,
      sources: {
        console: consoleConfig,
        mailbox: getMailboxConfig(),
        job: getJobDefaults(),
        defaultScopes: loadDefaultScopes(),
      },
    });
  }

  /**
   * Run one job once a pool slot is free.
   */
  async provision(request: ProvisionRequest, options: { signal?: AbortSignal } = {}): Promise<ProvisioningResult> {
    const config = buildJobConfig(request, this.sources);
    const jobId = randomUUID();
    log.info('Provisioning requested', { jobId, tenantId: request.tenantId, flavor: config.flavor });
    return this.pool.run(jobId, () => this.orchestrator.run(config, { jobId, signal: options.signal }));
  }

  /**
   * Run several jobs concurrently, bounded by the pool. One job's failure
   * (including a pool rejection) never affects the others.
   */
  async provisionMany(requests: ProvisionRequest[]): Promise<PromiseSettledResult<ProvisioningResult>[]> {
    return Promise.allSettled(requests.map((request) => this.provision(request)));
  }

  async credentials(tenantId: string): Promise<TenantCredentialRecord | null> {
    return this.store.get(tenantId);
  }

  async runs(tenantId: string, limit?: number): Promise<ProvisioningRunRecord[]> {
    return this.store.listRuns(tenantId, limit);
  }

  async close(): Promise<void> {
    this.pool.close();
    await this.store.close();
  }
}
