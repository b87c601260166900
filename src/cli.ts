#!/usr/bin/env node
/**
 * Command-line entry point
 *
 * Usage:
 *   credential-provisioner provision --tenant <id> --identity <login> --handle <handle>
 *                                    [--scopes a,b,c] [--name <integration>] [--headful] [--json]
 *   credential-provisioner refresh --tenant <id> --identity <login> --handle <handle> [--json]
 *   credential-provisioner inspect-token <jwt>
 *   credential-provisioner show-credentials --tenant <id>
 *
 * Exit code is 0 for completed, 2 for partial and 1 for failed or a usage error.
 * Results go to stdout; logs go to stderr.
 */

import 'dotenv/config';
import { pathToFileURL } from 'url';
import { inspectJwt } from './core/jwt-inspector.js';
import { SqliteCredentialStore } from './core/credential-store.js';
import { ProvisioningService, type ProvisionRequest } from './core/provisioning-service.js';
import type { ProvisioningFlavor, ProvisioningResult, TenantCredentialRecord } from './types/provisioning.js';
import { getLogConfig, getStoreConfig } from './utils/env-parser.js';
import { ConfigValidationError, ProvisioningError } from './utils/errors.js';
import { configureLogger, logger, maskSecret } from './utils/logger.js';

const log = logger.cli;

export const COMMANDS = ['provision', 'refresh', 'inspect-token', 'show-credentials'] as const;
export type Command = (typeof COMMANDS)[number];

export interface ParsedArgs {
  command: Command;
  positional: string[];
  options: Record<string, string>;
  flags: Set<string>;
}

const BOOLEAN_FLAGS = new Set(['headful', 'json', 'help']);

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse `argv` (without the node and script entries).
 * Accepts `--key value`, `--key=value` and bare boolean flags.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const [first, ...rest] = argv;
  if (!first || !isCommand(first)) {
    throw new UsageError(first ? `Unknown command: ${first}` : 'No command given');
  }

  const positional: string[] = [];
  const options: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }
    const body = arg.slice(2);
    const eq = body.indexOf('=');
    if (eq !== -1) {
      options[body.slice(0, eq)] = body.slice(eq + 1);
      continue;
    }
    if (BOOLEAN_FLAGS.has(body)) {
      flags.add(body);
      continue;
    }
    const next = rest[i + 1];
    if (next === undefined || next.startsWith('--')) {
      throw new UsageError(`Option --${body} needs a value`);
    }
    options[body] = next;
    i++;
  }

  return { command: first, positional, options, flags };
}

function required(args: ParsedArgs, name: string): string {
  const value = args.options[name];
  if (!value) {
    throw new UsageError(`Missing required option --${name}`);
  }
  return value;
}

export function toProvisionRequest(args: ParsedArgs, flavor: ProvisioningFlavor): ProvisionRequest {
  const scopes = args.options.scopes
    ?.split(',')
    .map((scope) => scope.trim())
    .filter((scope) => scope.length > 0);

  return {
    tenantId: required(args, 'tenant'),
    loginIdentity: required(args, 'identity'),
    targetTenantHandle: required(args, 'handle'),
    scopes: scopes?.length ? scopes : undefined,
    integrationName: args.options.name,
    flavor,
  };
}

export function exitCodeFor(result: Pick<ProvisioningResult, 'status'>): number {
  switch (result.status) {
    case 'completed':
      return 0;
    case 'partial':
      return 2;
    default:
      return 1;
  }
}

/**
 * Caller-facing view of a result with every token masked.
 */
export function maskResult(result: ProvisioningResult): Record<string, unknown> {
  const captured: Record<string, string> = {};
  for (const [kind, value] of Object.entries(result.captured)) {
    captured[kind] = maskSecret(value);
  }
  return {
    ...result,
    captured,
    expiresAt: result.expiresAt?.toISOString(),
  };
}

export function describeCredentials(record: TenantCredentialRecord): Record<string, unknown> {
  return {
    tenantId: record.tenantId,
    bearer: maskSecret(record.bearer),
    session: maskSecret(record.session),
    integration: maskSecret(record.integration),
    refresh: maskSecret(record.refresh),
    expiresAt: record.expiresAt?.toISOString() ?? null,
    sessionExpiresAt: record.sessionExpiresAt?.toISOString() ?? null,
    updatedAt: record.updatedAt.toISOString(),
  };
}

export function describeToken(token: string, now: Date = new Date()): Record<string, unknown> {
  const timing = inspectJwt(token);
  if (!timing) {
    return { valid: false };
  }
  const remainingMs = timing.expiresAt ? timing.expiresAt.getTime() - now.getTime() : null;
  return {
    valid: true,
    issuedAt: timing.issuedAt?.toISOString() ?? null,
    expiresAt: timing.expiresAt?.toISOString() ?? null,
    remainingSeconds: remainingMs === null ? null : Math.floor(remainingMs / 1000),
    expired: remainingMs === null ? null : remainingMs <= 0,
  };
}

function print(value: unknown, json: boolean): void {
  process.stdout.write(json ? `${JSON.stringify(value)}\n` : `${JSON.stringify(value, null, 2)}\n`);
}

async function provision(args: ParsedArgs, flavor: ProvisioningFlavor): Promise<number> {
  const request = toProvisionRequest(args, flavor);
  const service = ProvisioningService.fromEnvironment(args.flags.has('headful') ? { headless: false } : {});
  const controller = new AbortController();
  const onSignal = () => controller.abort(new Error('Interrupted'));
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  try {
    const result = await service.provision(request, { signal: controller.signal });
    print(maskResult(result), args.flags.has('json'));
    return exitCodeFor(result);
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
    await service.close();
  }
}

async function showCredentials(args: ParsedArgs): Promise<number> {
  const tenantId = required(args, 'tenant');
  const store = new SqliteCredentialStore({ dbPath: getStoreConfig().dbPath });
  try {
    const record = await store.get(tenantId);
    if (!record) {
      process.stderr.write(`No credentials stored for tenant ${tenantId}\n`);
      return 1;
    }
    print(describeCredentials(record), args.flags.has('json'));
    return 0;
  } finally {
    await store.close();
  }
}

function inspectToken(args: ParsedArgs): number {
  const token = args.positional[0];
  if (!token) {
    throw new UsageError('inspect-token needs a token argument');
  }
  const description = describeToken(token);
  print(description, args.flags.has('json'));
  return description.valid ? 0 : 1;
}

export async function main(argv: string[]): Promise<number> {
  try {
    configureLogger(getLogConfig());
    const args = parseArgs(argv);
    switch (args.command) {
      case 'provision':
        return await provision(args, 'full');
      case 'refresh':
        return await provision(args, 'token-refresh');
      case 'inspect-token':
        return inspectToken(args);
      case 'show-credentials':
        return await showCredentials(args);
    }
  } catch (error) {
    if (error instanceof UsageError || error instanceof ConfigValidationError) {
      process.stderr.write(`${error.message}\n`);
      return 1;
    }
    if (error instanceof ProvisioningError) {
      log.error('Provisioning could not start', { reason: error.reason, error });
      return 1;
    }
    throw error;
  }
}

const invokedDirectly = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (invokedDirectly) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      log.error('Unexpected failure', { error });
      process.exitCode = 1;
    }
  );
}
