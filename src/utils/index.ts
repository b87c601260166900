/**
 * Utilities barrel export
 */

export * from './errors.js';
export * from './retry.js';
export * from './timeouts.js';
export * from './env-parser.js';
export { logger, Logger, configureLogger, getLogger, maskSecret, type LogContext, type LoggerConfig } from './logger.js';
export {
  logConfigSchema,
  browserConfigSchema,
  consoleConfigSchema,
  mailboxConfigSchema,
  storeConfigSchema,
  poolConfigSchema,
  jobDefaultsSchema,
  formatConfigErrors,
  type LogLevel,
  type LogConfig,
  type BrowserConfig,
  type ConsoleConfig,
  type MailboxConfig,
  type StoreConfig,
  type PoolConfig,
  type JobDefaults,
} from './config-schemas.js';
