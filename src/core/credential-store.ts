/**
 * Credential Store - SQLite persistence for captured tenant credentials
 *
 * One row per tenant. Upserts are idempotent and field-wise: a field the
 * update leaves undefined keeps its stored value (COALESCE against the
 * existing row), so a token-refresh run never erases an integration token
 * minted earlier. Finished runs are archived alongside for audit.
 *
 * Schema:
 * - tenant_credentials: latest credentials per tenant
 * - provisioning_runs: one row per finished job
 * - migrations: applied schema versions
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import Database from 'better-sqlite3';
import { z } from 'zod';
import {
  JOB_STATUSES,
  PROVISIONING_FLAVORS,
  RESULT_STATUSES,
  TOKEN_KINDS,
  type CredentialUpdate,
  type ProvisioningRunRecord,
  type TenantCredentialRecord,
} from '../types/provisioning.js';
import { PersistenceFailureError, REASON_CODES } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { withRetry } from '../utils/retry.js';

const log = logger.store;

export interface CredentialStore {
  upsert(tenantId: string, update: CredentialUpdate): Promise<TenantCredentialRecord>;
  get(tenantId: string): Promise<TenantCredentialRecord | null>;
  archiveRun(record: ProvisioningRunRecord): Promise<void>;
  listRuns(tenantId: string, limit?: number): Promise<ProvisioningRunRecord[]>;
  close(): Promise<void>;
}

// ============================================
// ROWS
// ============================================

interface CredentialRow {
  tenant_id: string;
  bearer: string | null;
  session: string | null;
  integration: string | null;
  refresh: string | null;
  expires_at: number | null;
  session_expires_at: number | null;
  updated_at: number;
}

interface CredentialParams {
  tenantId: string;
  bearer: string | null;
  session: string | null;
  integration: string | null;
  refresh: string | null;
  expiresAt: number | null;
  sessionExpiresAt: number | null;
  updatedAt: number;
}

interface RunParams {
  jobId: string;
  tenantId: string;
  flavor: string;
  finalStatus: string;
  outcome: string;
  reason: string | null;
  capturedKinds: string;
  missingKinds: string;
  skippedScopes: string;
  startedAt: number;
  finishedAt: number;
}

const kindListSchema = z.array(z.enum(TOKEN_KINDS));

const runRowSchema = z.object({
  job_id: z.string(),
  tenant_id: z.string(),
  flavor: z.enum(PROVISIONING_FLAVORS),
  final_status: z.enum(JOB_STATUSES),
  outcome: z.enum(RESULT_STATUSES),
  reason: z.enum(REASON_CODES).nullable(),
  captured_kinds: z.string(),
  missing_kinds: z.string(),
  skipped_scopes: z.string(),
  started_at: z.number(),
  finished_at: z.number(),
});

function toDate(value: number | null): Date | null {
  return value === null ? null : new Date(value);
}

function rowToRecord(row: CredentialRow): TenantCredentialRecord {
  return {
    tenantId: row.tenant_id,
    bearer: row.bearer,
    session: row.session,
    integration: row.integration,
    refresh: row.refresh,
    expiresAt: toDate(row.expires_at),
    sessionExpiresAt: toDate(row.session_expires_at),
    updatedAt: new Date(row.updated_at),
  };
}

function parseRunRow(row: unknown): ProvisioningRunRecord {
  const parsed = runRowSchema.parse(row);
  return {
    jobId: parsed.job_id,
    tenantId: parsed.tenant_id,
    flavor: parsed.flavor,
    finalStatus: parsed.final_status,
    outcome: parsed.outcome,
    reason: parsed.reason,
    capturedKinds: kindListSchema.parse(JSON.parse(parsed.captured_kinds)),
    missingKinds: kindListSchema.parse(JSON.parse(parsed.missing_kinds)),
    skippedScopes: z.array(z.string()).parse(JSON.parse(parsed.skipped_scopes)),
    startedAt: new Date(parsed.started_at),
    finishedAt: new Date(parsed.finished_at),
  };
}

// ============================================
// SQLITE
// ============================================

const MIGRATIONS: ReadonlyArray<{ name: string; sql: string }> = [
  {
    name: '001_tenant_credentials',
    sql: `
      CREATE TABLE IF NOT EXISTS tenant_credentials (
        tenant_id TEXT PRIMARY KEY,
        bearer TEXT,
        session TEXT,
        integration TEXT,
        expires_at INTEGER,
        session_expires_at INTEGER,
        updated_at INTEGER NOT NULL
      );
    `,
  },
  {
    name: '002_refresh_token',
    sql: `ALTER TABLE tenant_credentials ADD COLUMN refresh TEXT;`,
  },
  {
    name: '003_provisioning_runs',
    sql: `
      CREATE TABLE IF NOT EXISTS provisioning_runs (
        job_id TEXT PRIMARY KEY,
        tenant_id TEXT NOT NULL,
        flavor TEXT NOT NULL,
        final_status TEXT NOT NULL,
        outcome TEXT NOT NULL,
        reason TEXT,
        captured_kinds TEXT NOT NULL,
        missing_kinds TEXT NOT NULL,
        skipped_scopes TEXT NOT NULL,
        started_at INTEGER NOT NULL,
        finished_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_provisioning_runs_tenant
        ON provisioning_runs(tenant_id, finished_at);
    `,
  },
];

const UPSERT_SQL = `
  INSERT INTO tenant_credentials
    (tenant_id, bearer, session, integration, refresh, expires_at, session_expires_at, updated_at)
  VALUES
    (@tenantId, @bearer, @session, @integration, @refresh, @expiresAt, @sessionExpiresAt, @updatedAt)
  ON CONFLICT(tenant_id) DO UPDATE SET
    bearer = COALESCE(excluded.bearer, tenant_credentials.bearer),
    session = COALESCE(excluded.session, tenant_credentials.session),
    integration = COALESCE(excluded.integration, tenant_credentials.integration),
    refresh = COALESCE(excluded.refresh, tenant_credentials.refresh),
    expires_at = COALESCE(excluded.expires_at, tenant_credentials.expires_at),
    session_expires_at = COALESCE(excluded.session_expires_at, tenant_credentials.session_expires_at),
    updated_at = excluded.updated_at
`;

export interface SqliteCredentialStoreConfig {
  /** Path to the SQLite database file; ':memory:' for tests */
  dbPath: string;
  /** Enable WAL mode for concurrent readers */
  walMode?: boolean;
  now?: () => Date;
}

export class SqliteCredentialStore implements CredentialStore {
  private readonly db: Database.Database;
  private readonly now: () => Date;

  constructor(config: SqliteCredentialStoreConfig) {
    this.now = config.now ?? (() => new Date());

    if (config.dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(config.dbPath), { recursive: true });
    }
    this.db = new Database(config.dbPath);

    if (config.walMode !== false && config.dbPath !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('busy_timeout = 5000');
    this.migrate();

    log.info('Credential store opened', { dbPath: config.dbPath });
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS migrations (
        name TEXT PRIMARY KEY,
        applied_at INTEGER NOT NULL
      );
    `);
    const applied = new Set(
      this.db
        .prepare<[], { name: string }>('SELECT name FROM migrations')
        .all()
        .map((row) => row.name)
    );
    const record = this.db.prepare<[string, number]>('INSERT INTO migrations (name, applied_at) VALUES (?, ?)');

    for (const migration of MIGRATIONS) {
      if (applied.has(migration.name)) {
        continue;
      }
      this.db.transaction(() => {
        this.db.exec(migration.sql);
        record.run(migration.name, Date.now());
      })();
      log.debug('Applied migration', { name: migration.name });
    }
  }

  async upsert(tenantId: string, update: CredentialUpdate): Promise<TenantCredentialRecord> {
    const params: CredentialParams = {
      tenantId,
      bearer: update.bearer ?? null,
      session: update.session ?? null,
      integration: update.integration ?? null,
      refresh: update.refresh ?? null,
      expiresAt: update.expiresAt?.getTime() ?? null,
      sessionExpiresAt: update.sessionExpiresAt?.getTime() ?? null,
      updatedAt: this.now().getTime(),
    };

    const record = await this.write('upsert', () => {
      this.db.prepare<CredentialParams>(UPSERT_SQL).run(params);
      return this.read(tenantId);
    });
    if (!record) {
      throw new PersistenceFailureError(`Upsert for tenant ${tenantId} left no row`);
    }

    log.info('Credentials stored', {
      tenantId,
      fields: Object.entries(update)
        .filter(([, value]) => value !== undefined)
        .map(([field]) => field),
    });
    return record;
  }

  async get(tenantId: string): Promise<TenantCredentialRecord | null> {
    return this.read(tenantId);
  }

  private read(tenantId: string): TenantCredentialRecord | null {
    const row = this.db
      .prepare<[string], CredentialRow>('SELECT * FROM tenant_credentials WHERE tenant_id = ?')
      .get(tenantId);
    return row ? rowToRecord(row) : null;
  }

  async archiveRun(record: ProvisioningRunRecord): Promise<void> {
    const params: RunParams = {
      jobId: record.jobId,
      tenantId: record.tenantId,
      flavor: record.flavor,
      finalStatus: record.finalStatus,
      outcome: record.outcome,
      reason: record.reason,
      capturedKinds: JSON.stringify(record.capturedKinds),
      missingKinds: JSON.stringify(record.missingKinds),
      skippedScopes: JSON.stringify(record.skippedScopes),
      startedAt: record.startedAt.getTime(),
      finishedAt: record.finishedAt.getTime(),
    };

    await this.write('archiveRun', () => {
      this.db
        .prepare<RunParams>(
          `INSERT OR REPLACE INTO provisioning_runs
            (job_id, tenant_id, flavor, final_status, outcome, reason,
             captured_kinds, missing_kinds, skipped_scopes, started_at, finished_at)
           VALUES
            (@jobId, @tenantId, @flavor, @finalStatus, @outcome, @reason,
             @capturedKinds, @missingKinds, @skippedScopes, @startedAt, @finishedAt)`
        )
        .run(params);
    });
  }

  async listRuns(tenantId: string, limit = 20): Promise<ProvisioningRunRecord[]> {
    return this.db
      .prepare<[string, number]>(
        'SELECT * FROM provisioning_runs WHERE tenant_id = ? ORDER BY finished_at DESC LIMIT ?'
      )
      .all(tenantId, limit)
      .map(parseRunRow);
  }

  /**
   * Run a write, retrying busy-lock errors; anything still failing becomes
   * a PersistenceFailureError.
   */
  private async write<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return await withRetry(async () => fn(), { maxAttempts: 3, initialDelayMs: 50, maxDelayMs: 500 });
    } catch (error) {
      log.error('Credential write failed', { operation, error });
      throw new PersistenceFailureError(`Credential store ${operation} failed`, { cause: error });
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

// ============================================
// IN-MEMORY
// ============================================

/**
 * Same merge semantics as the SQLite store, kept in a Map. Used for dry runs and tests.
 */
export class MemoryCredentialStore implements CredentialStore {
  private readonly records = new Map<string, TenantCredentialRecord>();
  private readonly runs: ProvisioningRunRecord[] = [];

  constructor(private readonly now: () => Date = () => new Date()) {}

  async upsert(tenantId: string, update: CredentialUpdate): Promise<TenantCredentialRecord> {
    const current = this.records.get(tenantId);
    const next: TenantCredentialRecord = {
      tenantId,
      bearer: update.bearer ?? current?.bearer ?? null,
      session: update.session ?? current?.session ?? null,
      integration: update.integration ?? current?.integration ?? null,
      refresh: update.refresh ?? current?.refresh ?? null,
      expiresAt: update.expiresAt ?? current?.expiresAt ?? null,
      sessionExpiresAt: update.sessionExpiresAt ?? current?.sessionExpiresAt ?? null,
      updatedAt: this.now(),
    };
    this.records.set(tenantId, next);
    return { ...next };
  }

  async get(tenantId: string): Promise<TenantCredentialRecord | null> {
    const record = this.records.get(tenantId);
    return record ? { ...record } : null;
  }

  async archiveRun(record: ProvisioningRunRecord): Promise<void> {
    const existing = this.runs.findIndex((run) => run.jobId === record.jobId);
    if (existing >= 0) {
      this.runs.splice(existing, 1);
    }
    this.runs.push({ ...record });
  }

  async listRuns(tenantId: string, limit = 20): Promise<ProvisioningRunRecord[]> {
    return this.runs
      .filter((run) => run.tenantId === tenantId)
      .sort((a, b) => b.finishedAt.getTime() - a.finishedAt.getTime())
      .slice(0, limit)
      .map((run) => ({ ...run }));
  }

  async close(): Promise<void> {
    this.records.clear();
  }
}
