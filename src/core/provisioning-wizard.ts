/**
 * Provisioning Wizard Driver
 *
 * Walks the console's "create integration" wizard:
 *
 *   NAVIGATE → OPEN_FORM → NAME → SELECT_SCOPES → SUBMIT → EXTRACT_TOKEN
 *
 * Every UI action resolves through the strategy table. A scope the console
 * will not accept is skipped and reported, never fatal. The minted token is
 * read from the result dialog; when that fails the driver clicks the copy
 * control and reads the clipboard, and finally scans nearby text nodes for a
 * token-shaped string.
 */

import type { IntegrationExtractionPath } from '../types/provisioning.js';
import type { ConsolePage, ElementProbe } from './console-page.js';
import { forScope, type StrategyTable } from './strategy-table.js';
import type { TokenInterceptor } from './token-interceptor.js';
import {
  clickAction,
  fillAction,
  ok,
  resolveAndAct,
  resolveOrThrow,
  retryable,
  type ResolveOptions,
  type StrategyAction,
} from './retry-orchestrator.js';
import { FatalEnvironmentError, ProvisioningError, toProvisioningError } from '../utils/errors.js';
import { logger, maskSecret, type Logger } from '../utils/logger.js';
import { TIMEOUTS } from '../utils/timeouts.js';

export type WizardStep = 'NAVIGATE' | 'OPEN_FORM' | 'NAME' | 'SELECT_SCOPES' | 'SUBMIT' | 'EXTRACT_TOKEN';

export interface WizardSettleTimes {
  afterNavigate: number;
  afterStep: number;
  scopeFilter: number;
  scopeAccept: number;
  /** Backoff between locator rounds */
  retryBackoff: number;
}

const DEFAULT_SETTLE: WizardSettleTimes = {
  afterNavigate: TIMEOUTS.WIZARD_SETTLE,
  afterStep: TIMEOUTS.WIZARD_SETTLE,
  scopeFilter: TIMEOUTS.SCOPE_FILTER_SETTLE,
  scopeAccept: TIMEOUTS.SCOPE_ACCEPT,
  retryBackoff: TIMEOUTS.LOCATOR_ROUND_BACKOFF,
};

/** Elements read per candidate selector during the nearby scan */
const MAX_SCAN_NODES = 25;

export interface WizardOptions {
  jobId: string;
  page: ConsolePage;
  strategies: StrategyTable['actions'];
  interceptor: TokenInterceptor;
  integrationsUrl: string;
  integrationName: string;
  scopes: readonly string[];
  tokenPrefix: string;
  tokenMinLength: number;
  signal?: AbortSignal;
  onStep?: (step: WizardStep) => void;
  settle?: Partial<WizardSettleTimes>;
}

export interface WizardResult {
  integration: string | null;
  extraction: IntegrationExtractionPath | null;
  acceptedScopes: string[];
  skippedScopes: string[];
  /** Step that failed, when the wizard did not finish */
  failedStep?: WizardStep;
  error?: ProvisioningError;
}

export class ProvisioningWizard {
  private readonly page: ConsolePage;
  private readonly strategies: StrategyTable['actions'];
  private readonly settle: WizardSettleTimes;
  private readonly log: Logger;
  private readonly acceptedScopes: string[] = [];
  private readonly skippedScopes: string[] = [];
  private step: WizardStep = 'NAVIGATE';

  constructor(private readonly options: WizardOptions) {
    this.page = options.page;
    this.strategies = options.strategies;
    this.settle = { ...DEFAULT_SETTLE, ...options.settle };
    this.log = logger.wizard.child({ jobId: options.jobId });
  }

  /**
   * Run every step. Step failures come back in the result; an abort is rethrown.
   */
  async run(): Promise<WizardResult> {
    try {
      await this.enter('NAVIGATE', () => this.navigate());
      await this.enter('OPEN_FORM', () => this.openForm());
      await this.enter('NAME', () => this.fillName());
      await this.enter('SELECT_SCOPES', () => this.selectScopes());
      await this.enter('SUBMIT', () => this.submit());
      const extracted = await this.enter('EXTRACT_TOKEN', () => this.extractToken());

      return {
        integration: extracted.value,
        extraction: extracted.path,
        acceptedScopes: [...this.acceptedScopes],
        skippedScopes: [...this.skippedScopes],
      };
    } catch (error) {
      if (this.options.signal?.aborted) {
        throw error;
      }
      const failure = toProvisioningError(error);
      this.log.warn('Wizard stopped', { step: this.step, reason: failure.reason, message: failure.message });
      return {
        integration: null,
        extraction: null,
        acceptedScopes: [...this.acceptedScopes],
        skippedScopes: [...this.skippedScopes],
        failedStep: this.step,
        error: failure,
      };
    }
  }

  private async enter<T>(step: WizardStep, work: () => Promise<T>): Promise<T> {
    this.step = step;
    this.options.onStep?.(step);
    const startTime = Date.now();
    const result = await work();
    this.log.timed('Wizard step done', startTime, { step });
    return result;
  }

  private get signal(): AbortSignal | undefined {
    return this.options.signal;
  }

  private resolveOptions(overrides: ResolveOptions = {}): ResolveOptions {
    return { signal: this.options.signal, backoffMs: this.settle.retryBackoff, ...overrides };
  }

  // ============================================
  // STEPS
  // ============================================

  private async navigate(): Promise<void> {
    try {
      await this.page.goto(this.options.integrationsUrl, { waitUntil: 'domcontentloaded', timeout: TIMEOUTS.PAGE_LOAD });
    } catch (error) {
      if (error instanceof FatalEnvironmentError) {
        throw error;
      }
      throw new ProvisioningError(`Could not open ${this.options.integrationsUrl}`, 'transient_ui', true, { cause: error });
    }
    try {
      await this.page.waitForLoadState('networkidle', TIMEOUTS.NETWORK_IDLE);
    } catch (error) {
      // The console long-polls; an idle network is a hint, not a requirement
      this.log.debug('Network did not go idle', { errorName: error instanceof Error ? error.name : typeof error });
    }
    await this.page.pause(this.settle.afterNavigate);
  }

  private async openForm(): Promise<void> {
    const primary = await resolveAndAct(
      this.page,
      'wizard.createPrimary',
      this.strategies['wizard.createPrimary'],
      clickAction(),
      this.resolveOptions({ maxRounds: 2 })
    );
    if (!primary.ok) {
      if (primary.fatal) {
        throw primary.error;
      }
      this.log.info('Primary create control not found; trying fallbacks', { tried: primary.tried });
      await resolveOrThrow(
        this.page,
        'wizard.createFallback',
        this.strategies['wizard.createFallback'],
        clickAction(),
        this.resolveOptions()
      );
    }
    await this.page.pause(this.settle.afterStep);
  }

  private async fillName(): Promise<void> {
    await resolveOrThrow(
      this.page,
      'wizard.name',
      this.strategies['wizard.name'],
      fillAction(this.options.integrationName),
      this.resolveOptions()
    );

    // Single-page variants of the form have no Next button
    const next = await resolveAndAct(
      this.page,
      'wizard.next',
      this.strategies['wizard.next'],
      clickAction(),
      this.resolveOptions({ maxRounds: 1 })
    );
    if (!next.ok && next.fatal) {
      throw next.error;
    }
    await this.page.pause(this.settle.afterStep);
  }

  private async selectScopes(): Promise<void> {
    const focusInput: StrategyAction<ElementProbe> = async ({ element }) => {
      await element.click({ timeout: TIMEOUTS.LOCATOR_TRY });
      return ok(element);
    };
    const input = await resolveOrThrow(
      this.page,
      'wizard.scopeInput',
      this.strategies['wizard.scopeInput'],
      focusInput,
      this.resolveOptions()
    );

    for (const scope of this.options.scopes) {
      if (await this.addScope(input, scope)) {
        this.acceptedScopes.push(scope);
      } else {
        this.skippedScopes.push(scope);
        this.log.warn('Scope not accepted; skipping', { scope });
        await this.clearInput(input);
      }
    }

    this.log.info('Scopes selected', {
      accepted: this.acceptedScopes.length,
      skipped: this.skippedScopes,
    });
  }

  private async addScope(input: ElementProbe, scope: string): Promise<boolean> {
    try {
      await input.fill(scope, { timeout: TIMEOUTS.LOCATOR_TRY });
      await this.page.pause(this.settle.scopeFilter);
      await input.press('Enter', { timeout: TIMEOUTS.LOCATOR_TRY });
    } catch (error) {
      if (this.signal?.aborted || error instanceof FatalEnvironmentError) {
        throw error;
      }
      this.log.debug('Scope entry failed', { scope, errorName: error instanceof Error ? error.name : typeof error });
      return false;
    }

    const accepted = await resolveAndAct(
      this.page,
      'wizard.scopeAccepted',
      forScope(this.strategies['wizard.scopeAccepted'], scope),
      async () => ok(true),
      this.resolveOptions({ maxRounds: 1, perTryTimeoutMs: this.settle.scopeAccept })
    );
    if (!accepted.ok && accepted.fatal) {
      throw accepted.error;
    }
    return accepted.ok;
  }

  private async clearInput(input: ElementProbe): Promise<void> {
    try {
      await input.fill('', { timeout: TIMEOUTS.LOCATOR_TRY });
    } catch (error) {
      if (error instanceof FatalEnvironmentError) {
        throw error;
      }
      this.log.debug('Could not clear scope input', { errorName: error instanceof Error ? error.name : typeof error });
    }
  }

  private async submit(): Promise<void> {
    await resolveOrThrow(
      this.page,
      'wizard.submit',
      this.strategies['wizard.submit'],
      clickAction(),
      this.resolveOptions()
    );
    await this.page.pause(this.settle.afterStep);
  }

  // ============================================
  // TOKEN EXTRACTION
  // ============================================

  private async extractToken(): Promise<{ value: string; path: IntegrationExtractionPath }> {
    const found = (await this.fromDialog()) ?? (await this.fromClipboard()) ?? (await this.fromNearbyNodes());
    if (!found) {
      throw new ProvisioningError('Integration token was created but could not be read back', 'integration_not_extracted', true);
    }

    this.options.interceptor.record('integration', found.value, found.path);
    const fields = { path: found.path, preview: maskSecret(found.value, this.options.tokenPrefix.length + 4) };
    if (found.path === 'result-dialog') {
      this.log.info('Integration token extracted', fields);
    } else {
      this.log.info('Integration token extracted through fallback', { ...fields, fallback: true });
    }
    return found;
  }

  private async fromDialog(): Promise<{ value: string; path: IntegrationExtractionPath } | null> {
    const readDialog: StrategyAction<string> = async ({ element }) => {
      const text = await readElementText(element);
      return this.isPlausible(text) ? ok(text) : retryable('implausible token text');
    };
    const result = await resolveAndAct(
      this.page,
      'wizard.tokenDialog',
      this.strategies['wizard.tokenDialog'],
      readDialog,
      this.resolveOptions({ maxRounds: 2 })
    );
    if (result.ok) {
      return { value: result.value, path: 'result-dialog' };
    }
    if (result.fatal) {
      throw result.error;
    }
    this.log.info('Result dialog unreadable', { tried: result.tried });
    return null;
  }

  private async fromClipboard(): Promise<{ value: string; path: IntegrationExtractionPath } | null> {
    const copied = await resolveAndAct(
      this.page,
      'wizard.copyButton',
      this.strategies['wizard.copyButton'],
      clickAction(),
      this.resolveOptions({ maxRounds: 1 })
    );
    if (!copied.ok) {
      if (copied.fatal) {
        throw copied.error;
      }
      return null;
    }

    const text = (await this.page.readClipboard())?.trim() ?? '';
    if (this.isPlausible(text)) {
      return { value: text, path: 'clipboard' };
    }
    this.log.info('Clipboard held no plausible token', { length: text.length });
    return null;
  }

  private async fromNearbyNodes(): Promise<{ value: string; path: IntegrationExtractionPath } | null> {
    const shape = this.tokenShape();
    for (const strategy of this.strategies['wizard.tokenCandidates']) {
      const matches = this.page.locator(strategy.selector);
      const total = Math.min(await matches.count(), MAX_SCAN_NODES);
      for (let i = 0; i < total; i++) {
        let text: string;
        try {
          text = await readElementText(matches.nth(i));
        } catch (error) {
          if (error instanceof FatalEnvironmentError) {
            throw error;
          }
          this.log.debug('Skipping unreadable node', { strategy: strategy.name, index: i });
          continue;
        }
        const match = shape.exec(text);
        if (match) {
          return { value: match[0], path: 'nearby-scan' };
        }
      }
    }
    return null;
  }

  /**
   * A value is a plausible integration token when it carries the expected
   * prefix, reaches the minimum length and has no whitespace.
   */
  isPlausible(value: string): boolean {
    return (
      value.startsWith(this.options.tokenPrefix) &&
      value.length >= this.options.tokenMinLength &&
      !/\s/.test(value)
    );
  }

  private tokenShape(): RegExp {
    const prefix = this.options.tokenPrefix.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    const rest = Math.max(1, this.options.tokenMinLength - this.options.tokenPrefix.length);
    return new RegExp(`${prefix}[A-Za-z0-9_-]{${rest},}`);
  }
}

/**
 * Text of a node, falling back to the value of form fields.
 */
async function readElementText(element: ElementProbe): Promise<string> {
  const text = (await element.textContent({ timeout: TIMEOUTS.LOCATOR_TRY }))?.trim();
  if (text) {
    return text;
  }
  return (await element.inputValue({ timeout: TIMEOUTS.LOCATOR_TRY })).trim();
}
