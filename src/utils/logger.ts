/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Structured metadata for each log entry
 * - Redaction of every credential-bearing field (tokens never reach the log sink)
 */

import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';
import { logLevelSchema, type LogLevel } from './config-schemas.js';

export type { LogLevel };

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  jobId?: string;
  tenantId?: string;
  step?: string;
  action?: string;
  strategy?: string;
  attempt?: number;
  durationMs?: number;
  [key: string]: unknown;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
}

function levelFromEnv(): LogLevel {
  const parsed = logLevelSchema.safeParse(process.env.LOG_LEVEL);
  return parsed.success ? parsed.data : 'info';
}

// Logs go to stderr so CLI output on stdout stays machine-readable.
// The CLI applies the validated log config section (including pretty printing) at startup.
const DEFAULT_CONFIG: LoggerConfig = {
  level: levelFromEnv(),
  prettyPrint: false,
  destination: 'stderr',
};

/**
 * Paths to redact from logs to prevent secrets from leaking.
 * Uses Pino's path syntax (wildcards with *)
 *
 * See: https://getpino.io/#/docs/redaction
 */
const REDACT_PATHS = [
  // Request headers observed by the token interceptor
  '*.authorization',
  '*.Authorization',
  '*.cookie',
  '*.Cookie',
  '*["token-id"]',
  'headers.authorization',
  'headers.cookie',
  'headers["token-id"]',

  // Login and mailbox secrets
  '*.password',
  '*.secret',
  '*.loginSecret',
  '*.pass',

  // Captured credentials
  '*.token',
  '*.bearer',
  '*.session',
  '*.integration',
  '*.refresh',
  '*.value',
  '*.accessToken',
  '*.refreshToken',
  'captured.bearer',
  'captured.session',
  'captured.integration',
  'captured.refresh',

  // OTP codes
  '*.code',
  '*.otp',

  // Browser storage snapshots
  '*.localStorage',
  '*.sessionStorage',
];

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig = DEFAULT_CONFIG): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'credential-provisioner',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },
  };

  const destination = config.destination === 'stderr' ? process.stderr : process.stdout;

  // Pretty print for development
  if (config.prettyPrint) {
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname,service',
          destination: config.destination === 'stderr' ? 2 : 1,
        },
      },
    });
  }

  return pino(options, destination);
}

// Base logger instance
let baseLogger = createBaseLogger();

/**
 * Reconfigure the logger (useful for testing or runtime changes)
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  baseLogger = createBaseLogger({ ...DEFAULT_CONFIG, ...config });
}

/**
 * Get the base logger
 */
export function getLogger(): PinoLogger {
  return baseLogger;
}

/**
 * Component-specific logger wrapper
 *
 * Uses a getter to always access the current baseLogger, allowing
 * reconfiguration at runtime via configureLogger().
 */
export class Logger {
  private _logger: PinoLogger | null = null;
  private component: string;

  constructor(component: string, parentLogger?: PinoLogger) {
    this.component = component;
    if (parentLogger) {
      this._logger = parentLogger.child({ component });
    }
  }

  private get logger(): PinoLogger {
    if (this._logger) {
      return this._logger;
    }
    // Fresh child each time so configureLogger() changes take effect
    return baseLogger.child({ component: this.component });
  }

  /**
   * Create a child logger with additional context (job id, tenant, step)
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.component, this.logger);
    childLogger._logger = this.logger.child(context);
    return childLogger;
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, message);
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, message);
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, message);
  }

  /**
   * Error level - error conditions
   * Accepts unknown type for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    if (context?.error) {
      const err = context.error instanceof Error
        ? {
            message: context.error.message,
            name: context.error.name,
            stack: context.error.stack,
          }
        : { message: String(context.error) };

      this.logger.error(
        {
          ...context,
          err,
        },
        message
      );
    } else {
      this.logger.error(context || {}, message);
    }
  }

  /**
   * Log with timing information
   */
  timed(message: string, startTime: number, context?: LogContext): void {
    const durationMs = Date.now() - startTime;
    this.info(message, { ...context, durationMs });
  }
}

/**
 * Pre-configured loggers for each component
 */
export const logger = {
  browser: new Logger('BrowserManager'),
  session: new Logger('BrowserSession'),
  login: new Logger('LoginStateMachine'),
  mailbox: new Logger('MailboxPoller'),
  interceptor: new Logger('TokenInterceptor'),
  wizard: new Logger('ProvisioningWizard'),
  locator: new Logger('RetryOrchestrator'),
  store: new Logger('CredentialStore'),
  orchestrator: new Logger('ProvisioningOrchestrator'),
  pool: new Logger('JobPool'),
  retry: new Logger('Retry'),
  cli: new Logger('Cli'),

  // Create a custom logger for any component
  create: (component: string) => new Logger(component),
};

/**
 * Mask a credential for display: keeps a short prefix so operators can tell
 * tokens apart without the value ever being printed in full.
 */
export function maskSecret(value: string | null | undefined, visible = 8): string {
  if (!value) {
    return '(none)';
  }
  if (value.length <= visible) {
    return '*'.repeat(value.length);
  }
  return `${value.slice(0, visible)}…(${value.length} chars)`;
}

export default logger;
