/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration. Sections are parsed lazily so a command that only
 * needs the store (show-credentials) does not demand mailbox settings.
 */

import type { z } from 'zod';
import {
  logConfigSchema,
  browserConfigSchema,
  consoleConfigSchema,
  mailboxConfigSchema,
  storeConfigSchema,
  poolConfigSchema,
  jobDefaultsSchema,
  type LogConfig,
  type BrowserConfig,
  type ConsoleConfig,
  type MailboxConfig,
  type StoreConfig,
  type PoolConfig,
  type JobDefaults,
} from './config-schemas.js';
import { ConfigValidationError } from './errors.js';

type Env = Record<string, string | undefined>;

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig(env: Env) {
  return {
    level: env.LOG_LEVEL,
    prettyPrint: env.LOG_PRETTY,
  };
}

function mapEnvToBrowserConfig(env: Env) {
  return {
    headless: env.BROWSER_HEADLESS,
    debug: env.DEBUG_BROWSER,
    slowMo: env.BROWSER_SLOW_MO,
    screenshotDir: env.SCREENSHOT_DIR,
    launchTimeoutMs: env.BROWSER_LAUNCH_TIMEOUT_MS,
    executablePath: env.BROWSER_EXECUTABLE_PATH,
  };
}

function mapEnvToConsoleConfig(env: Env) {
  return {
    baseUrl: env.CONSOLE_BASE_URL,
    loginPath: env.CONSOLE_LOGIN_PATH,
    integrationsPath: env.CONSOLE_INTEGRATIONS_PATH,
    authenticatedPattern: env.CONSOLE_AUTHENTICATED_PATTERN,
    loginSecret: env.CONSOLE_LOGIN_SECRET,
    tokenPrefix: env.INTEGRATION_TOKEN_PREFIX,
    tokenMinLength: env.INTEGRATION_TOKEN_MIN_LENGTH,
    strategyTablePath: env.STRATEGY_TABLE_PATH,
  };
}

function mapEnvToMailboxConfig(env: Env) {
  return {
    host: env.MAILBOX_HOST,
    port: env.MAILBOX_PORT,
    secure: env.MAILBOX_SECURE,
    user: env.MAILBOX_USER,
    password: env.MAILBOX_PASSWORD,
    mailbox: env.MAILBOX_FOLDER,
    sender: env.OTP_SENDER,
    subject: env.OTP_SUBJECT,
    maxAttempts: env.OTP_MAX_ATTEMPTS,
    pollIntervalMs: env.OTP_POLL_INTERVAL_MS,
    clockSkewMs: env.OTP_CLOCK_SKEW_MS,
  };
}

function mapEnvToStoreConfig(env: Env) {
  return {
    dbPath: env.CREDENTIAL_DB_PATH,
  };
}

function mapEnvToPoolConfig(env: Env) {
  return {
    maxConcurrent: env.JOB_POOL_MAX_CONCURRENT,
    queueSize: env.JOB_POOL_QUEUE_SIZE,
    queueTimeoutMs: env.JOB_POOL_QUEUE_TIMEOUT_MS,
  };
}

function mapEnvToJobDefaults(env: Env) {
  return {
    timeoutMs: env.JOB_TIMEOUT_MS,
    integrationName: env.INTEGRATION_NAME,
    scopes: env.INTEGRATION_SCOPES,
  };
}

function parseSection<S extends z.ZodTypeAny>(section: string, schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

export function parseLogConfig(env: Env = process.env): LogConfig {
  return parseSection('logging', logConfigSchema, mapEnvToLogConfig(env));
}

export function parseBrowserConfig(env: Env = process.env): BrowserConfig {
  return parseSection('browser', browserConfigSchema, mapEnvToBrowserConfig(env));
}

export function parseConsoleConfig(env: Env = process.env): ConsoleConfig {
  return parseSection('console', consoleConfigSchema, mapEnvToConsoleConfig(env));
}

export function parseMailboxConfig(env: Env = process.env): MailboxConfig {
  return parseSection('mailbox', mailboxConfigSchema, mapEnvToMailboxConfig(env));
}

export function parseStoreConfig(env: Env = process.env): StoreConfig {
  return parseSection('store', storeConfigSchema, mapEnvToStoreConfig(env));
}

export function parsePoolConfig(env: Env = process.env): PoolConfig {
  return parseSection('pool', poolConfigSchema, mapEnvToPoolConfig(env));
}

export function parseJobDefaults(env: Env = process.env): JobDefaults {
  return parseSection('job', jobDefaultsSchema, mapEnvToJobDefaults(env));
}

// ============================================
// CONFIG CACHING
// ============================================

let cachedLogConfig: LogConfig | null = null;
let cachedBrowserConfig: BrowserConfig | null = null;
let cachedConsoleConfig: ConsoleConfig | null = null;
let cachedMailboxConfig: MailboxConfig | null = null;
let cachedStoreConfig: StoreConfig | null = null;
let cachedPoolConfig: PoolConfig | null = null;
let cachedJobDefaults: JobDefaults | null = null;

/**
 * Get cached log configuration (parses once on first call).
 */
export function getLogConfig(): LogConfig {
  if (!cachedLogConfig) {
    cachedLogConfig = parseLogConfig();
  }
  return cachedLogConfig;
}

export function getBrowserConfig(): BrowserConfig {
  if (!cachedBrowserConfig) {
    cachedBrowserConfig = parseBrowserConfig();
  }
  return cachedBrowserConfig;
}

export function getConsoleConfig(): ConsoleConfig {
  if (!cachedConsoleConfig) {
    cachedConsoleConfig = parseConsoleConfig();
  }
  return cachedConsoleConfig;
}

export function getMailboxConfig(): MailboxConfig {
  if (!cachedMailboxConfig) {
    cachedMailboxConfig = parseMailboxConfig();
  }
  return cachedMailboxConfig;
}

export function getStoreConfig(): StoreConfig {
  if (!cachedStoreConfig) {
    cachedStoreConfig = parseStoreConfig();
  }
  return cachedStoreConfig;
}

export function getPoolConfig(): PoolConfig {
  if (!cachedPoolConfig) {
    cachedPoolConfig = parsePoolConfig();
  }
  return cachedPoolConfig;
}

export function getJobDefaults(): JobDefaults {
  if (!cachedJobDefaults) {
    cachedJobDefaults = parseJobDefaults();
  }
  return cachedJobDefaults;
}

/**
 * Clear all cached configurations.
 * Useful for testing when environment variables change.
 */
export function clearConfigCache(): void {
  cachedLogConfig = null;
  cachedBrowserConfig = null;
  cachedConsoleConfig = null;
  cachedMailboxConfig = null;
  cachedStoreConfig = null;
  cachedPoolConfig = null;
  cachedJobDefaults = null;
}
