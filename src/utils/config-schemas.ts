/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true and 'false', '0', 'no' as false;
 * an unset variable takes the given default.
 */
export function booleanStringSchema(defaultValue = false) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (!val) return defaultValue;
      const normalized = val.toLowerCase();
      if (['true', '1', 'yes'].includes(normalized)) return true;
      if (['false', '0', 'no'].includes(normalized)) return false;
      return defaultValue;
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options?: {
  min?: number;
  max?: number;
  default?: number;
}) {
  const { min, max } = options ?? {};
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  if (options?.default !== undefined) {
    return schema.default(options.default);
  }
  return schema;
}

/**
 * Schema for a valid URL string.
 */
export const urlSchema = z.string().url();

/**
 * Schema for a comma-separated list of strings.
 */
export const commaSeparatedListSchema = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

/**
 * Schema for a regular expression source string; rejects patterns that do not compile.
 */
export const regexSourceSchema = z.string().refine(
  (source) => {
    try {
      new RegExp(source);
      return true;
    } catch {
      return false;
    }
  },
  { message: 'Must be a valid regular expression' }
);

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// BROWSER CONFIGURATION
// ============================================

export const browserConfigSchema = z
  .object({
    headless: booleanStringSchema(true),
    debug: booleanStringSchema(false),
    slowMo: integerStringSchema({ min: 0, max: 5000, default: 0 }),
    screenshotDir: z.string().min(1).optional(),
    launchTimeoutMs: integerStringSchema({ min: 1000, max: 300000, default: 30000 }),
    executablePath: z.string().min(1).optional(),
  })
  .transform((config) => {
    // Debug mode always shows the browser and slows it down enough to follow
    if (config.debug) {
      return {
        ...config,
        headless: false,
        slowMo: config.slowMo || 100,
      };
    }
    return config;
  });

export type BrowserConfig = z.infer<typeof browserConfigSchema>;

// ============================================
// TARGET CONSOLE CONFIGURATION
// ============================================

export const consoleConfigSchema = z.object({
  baseUrl: urlSchema,
  loginPath: z.string().startsWith('/').default('/login'),
  integrationsPath: z
    .string()
    .includes('{handle}', { message: 'Integrations path must contain the {handle} placeholder' })
    .default('/v2/location/{handle}/settings/private-integrations/'),
  authenticatedPattern: regexSourceSchema.default('/v2/location/|/dashboard'),
  loginSecret: z.string().min(1).optional(),
  tokenPrefix: z.string().min(1).default('pit-'),
  tokenMinLength: integerStringSchema({ min: 8, max: 512, default: 20 }),
  strategyTablePath: z.string().min(1).optional(),
});

export type ConsoleConfig = z.infer<typeof consoleConfigSchema>;

// ============================================
// MAILBOX CONFIGURATION
// ============================================

export const mailboxConfigSchema = z.object({
  host: z.string().min(1),
  port: integerStringSchema({ min: 1, max: 65535, default: 993 }),
  secure: booleanStringSchema(true),
  user: z.string().min(1),
  password: z.string().min(1),
  mailbox: z.string().min(1).default('INBOX'),
  sender: z.string().min(1).optional(),
  subject: z.string().min(1).optional(),
  maxAttempts: integerStringSchema({ min: 1, max: 600, default: 30 }),
  pollIntervalMs: integerStringSchema({ min: 100, max: 60000, default: 1000 }),
  clockSkewMs: integerStringSchema({ min: 0, max: 600000, default: 60000 }),
});

export type MailboxConfig = z.infer<typeof mailboxConfigSchema>;

// ============================================
// STORE CONFIGURATION
// ============================================

export const storeConfigSchema = z.object({
  dbPath: z.string().min(1).default('./data/credentials.db'),
});

export type StoreConfig = z.infer<typeof storeConfigSchema>;

// ============================================
// JOB POOL CONFIGURATION
// ============================================

export const poolConfigSchema = z.object({
  maxConcurrent: integerStringSchema({ min: 1, max: 16, default: 2 }),
  queueSize: integerStringSchema({ min: 0, max: 1000, default: 10 }),
  queueTimeoutMs: integerStringSchema({ min: 1000, max: 3600000, default: 600000 }),
});

export type PoolConfig = z.infer<typeof poolConfigSchema>;

// ============================================
// JOB CONFIGURATION
// ============================================

export const jobDefaultsSchema = z.object({
  timeoutMs: integerStringSchema({ min: 10000, max: 3600000, default: 300000 }),
  integrationName: z.string().min(1).default('location key'),
  scopes: commaSeparatedListSchema.optional(),
});

export type JobDefaults = z.infer<typeof jobDefaultsSchema>;

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}
