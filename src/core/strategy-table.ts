/**
 * Strategy Table Loader
 *
 * Locator strategies are data, not code: every logical UI action maps to an
 * ordered list of selectors kept in config/strategies.json. A console
 * redesign is handled by editing (or overriding, via STRATEGY_TABLE_PATH) that
 * file. The table carries a version so logs show which one a run used.
 *
 * @example
 * // config/strategies.json
 * {
 *   "version": 3,
 *   "actions": {
 *     "login.identity": [
 *       { "name": "email-type", "selector": "input[type=\"email\"]" }
 *     ]
 *   }
 * }
 */

import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { formatConfigErrors } from '../utils/config-schemas.js';
import { ProvisioningError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.create('StrategyTable');

// ============================================
// SCHEMA
// ============================================

/**
 * Every action the login machine and the wizard resolve through the table.
 */
export const ACTION_NAMES = [
  'login.identity',
  'login.secret',
  'login.submit',
  'probe.loginForm',
  'probe.mfaChallenge',
  'mfa.sendCode',
  'mfa.code',
  'mfa.submit',
  'wizard.createPrimary',
  'wizard.createFallback',
  'wizard.name',
  'wizard.next',
  'wizard.scopeInput',
  'wizard.scopeAccepted',
  'wizard.submit',
  'wizard.tokenDialog',
  'wizard.copyButton',
  'wizard.tokenCandidates',
] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

export const selectorStrategySchema = z.object({
  name: z.string().min(1),
  selector: z.string().min(1),
  /** Only meaningful for code entry: one field for the whole code, or one per digit */
  mode: z.enum(['single', 'per-digit']).optional(),
});

export type SelectorStrategy = z.infer<typeof selectorStrategySchema>;

const strategyListSchema = z.array(selectorStrategySchema).min(1);

const actionsSchema = z.object({
  'login.identity': strategyListSchema,
  'login.secret': strategyListSchema,
  'login.submit': strategyListSchema,
  'probe.loginForm': strategyListSchema,
  'probe.mfaChallenge': strategyListSchema,
  'mfa.sendCode': strategyListSchema,
  'mfa.code': strategyListSchema,
  'mfa.submit': strategyListSchema,
  'wizard.createPrimary': strategyListSchema,
  'wizard.createFallback': strategyListSchema,
  'wizard.name': strategyListSchema,
  'wizard.next': strategyListSchema,
  'wizard.scopeInput': strategyListSchema,
  'wizard.scopeAccepted': strategyListSchema.refine(
    (list) => list.every((strategy) => strategy.selector.includes('{scope}')),
    { message: 'Scope acceptance selectors must contain the {scope} placeholder' }
  ),
  'wizard.submit': strategyListSchema,
  'wizard.tokenDialog': strategyListSchema,
  'wizard.copyButton': strategyListSchema,
  'wizard.tokenCandidates': strategyListSchema,
});

export const strategyTableSchema = z.object({
  version: z.number().int().min(1),
  actions: actionsSchema,
});

export type StrategyTable = z.infer<typeof strategyTableSchema>;

// ============================================
// LOADING
// ============================================

/**
 * The table shipped with the package, two levels up from src/core (or dist/core).
 */
export function defaultStrategyTablePath(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  return join(here, '..', '..', 'config', 'strategies.json');
}

/**
 * Validate an already-parsed table.
 */
export function parseStrategyTable(input: unknown, source = 'inline'): StrategyTable {
  const result = strategyTableSchema.safeParse(input);
  if (!result.success) {
    throw new ProvisioningError(
      `Invalid strategy table (${source}):\n${formatConfigErrors(result.error)}`,
      'config_invalid',
      false
    );
  }
  return result.data;
}

/**
 * Read and validate a strategy table file. Missing or malformed files are
 * configuration errors, not retryable failures.
 */
export function loadStrategyTable(filePath: string = defaultStrategyTablePath()): StrategyTable {
  if (!existsSync(filePath)) {
    throw new ProvisioningError(`Strategy table not found: ${filePath}`, 'config_invalid', false);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ProvisioningError(`Strategy table is not valid JSON: ${filePath}`, 'config_invalid', false, {
      cause: error,
    });
  }

  const table = parseStrategyTable(parsed, filePath);
  log.debug('Loaded strategy table', { path: filePath, version: table.version });
  return table;
}

/**
 * Substitute `{scope}` in acceptance selectors. Double quotes are escaped so
 * the name stays inside the `:has-text("...")` argument.
 */
export function forScope(strategies: readonly SelectorStrategy[], scope: string): SelectorStrategy[] {
  const escaped = scope.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
  return strategies.map((strategy) => ({
    ...strategy,
    selector: strategy.selector.split('{scope}').join(escaped),
  }));
}

/**
 * The scope set requested when a job names none.
 */
export function loadDefaultScopes(): string[] {
  const here = dirname(fileURLToPath(import.meta.url));
  const filePath = join(here, '..', '..', 'config', 'default-scopes.json');
  const result = z.array(z.string().min(1)).min(1).safeParse(JSON.parse(readFileSync(filePath, 'utf-8')));
  if (!result.success) {
    throw new ProvisioningError(
      `Invalid default scope list:\n${formatConfigErrors(result.error)}`,
      'config_invalid',
      false
    );
  }
  return result.data;
}
