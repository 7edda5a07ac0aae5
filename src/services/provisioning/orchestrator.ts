/**
 * Provisioning Orchestrator
 *
 * Maps a package life-cycle event (and the version being upgraded from, if
 * any) onto one provisioning run:
 *
 *   configure/reconfigure, no prior version  -> fresh-install
 *   configure/reconfigure, prior version     -> upgrade
 *   abort-upgrade/abort-remove/abort-deconfigure -> aborted (nothing touched)
 *   anything else                            -> failed
 *
 * @module services/provisioning/orchestrator
 */

import {
  databaseName,
  requiredDatabases,
  requiredRoles,
  type DatabaseKey,
  type ProvisioningConfig,
} from '../../config/config.js';
import type { AdminCredentialSource } from '../../config/credentials.js';
import type { AdminCredentials } from '../../utils/validation.js';
import type { AdminConnection, SqlSession } from '../storage/connection.js';
import type { DatabaseProvisionResult, RoleProvisionResult } from '../storage/types.js';
import { ensureRole } from '../storage/roles.js';
import { ensureDatabase } from '../storage/databases.js';
import { PgUserStore, type CreateUserStatus, type UserStore } from '../users/user-store.js';
import { hashPassword } from '../users/password.js';
import { ADMINISTRATOR_ROLES } from '../users/roles.js';
import { MIGRATION_STEPS } from '../migrations/steps.js';
import { applyMigrations, assertAscending, planMigrations } from '../migrations/sequencer.js';
import type { MigrationContext, MigrationReport, MigrationStep } from '../migrations/types.js';
import {
  LEGACY_IMPORT_THRESHOLD,
  LegacyCredentialImporter,
  type LegacyImportReport,
} from '../legacy/importer.js';
import { isValidVersion, lessThan } from '../../utils/version.js';
import {
  ProvisioningError,
  errorMessage,
  invalidVersionError,
  unknownLifecycleEventError,
} from '../../utils/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const CONFIGURE_EVENTS = ['configure', 'reconfigure'] as const;
export const ABORT_EVENTS = ['abort-upgrade', 'abort-remove', 'abort-deconfigure'] as const;

export type ConfigureEvent = (typeof CONFIGURE_EVENTS)[number];
export type AbortEvent = (typeof ABORT_EVENTS)[number];
export type LifecycleEvent = ConfigureEvent | AbortEvent;

export type ProvisioningState = 'fresh-install' | 'upgrade' | 'aborted' | 'failed';

export type AdminUserStatus = CreateUserStatus | 'failed';

export interface ProvisioningResult {
  event: string;
  state: ProvisioningState;
  exitCode: 0 | 1;
  roles: RoleProvisionResult[];
  databases: DatabaseProvisionResult[];
  /** Fresh install only */
  adminUser?: AdminUserStatus;
  /** Upgrade only */
  migrations?: MigrationReport;
  /** Upgrade from before the legacy import threshold only */
  legacyImport?: LegacyImportReport;
  error?: ProvisioningError;
}

export interface ProvisioningDeps {
  config: ProvisioningConfig;
  /** Open the administrative connection; called at most once per run */
  connect(): Promise<AdminConnection>;
  credentials: AdminCredentialSource;
  /** Defaults to the shipped migration steps */
  steps?: readonly MigrationStep[];
  /** Defaults to the users table on the given session */
  userStoreFor?(session: SqlSession): UserStore;
}

export function isConfigureEvent(event: string): event is ConfigureEvent {
  return CONFIGURE_EVENTS.some((candidate) => candidate === event);
}

export function isAbortEvent(event: string): event is AbortEvent {
  return ABORT_EVENTS.some((candidate) => candidate === event);
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE SESSIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Sessions on the configured databases, opened on first use and shared by
 * the migration steps and the legacy import.
 */
class DatabaseSessions implements MigrationContext {
  private readonly open = new Map<DatabaseKey, Promise<SqlSession>>();

  constructor(
    private readonly admin: AdminConnection,
    private readonly config: ProvisioningConfig
  ) {}

  session(key: DatabaseKey): Promise<SqlSession> {
    let session = this.open.get(key);
    if (!session) {
      session = this.admin.openDatabase(databaseName(this.config, key));
      this.open.set(key, session);
    }
    return session;
  }

  async closeAll(): Promise<void> {
    const pending = [...this.open.values()];
    this.open.clear();
    const settled = await Promise.allSettled(pending);
    for (const outcome of settled) {
      if (outcome.status === 'fulfilled') {
        await closeQuietly(outcome.value);
      }
    }
  }
}

async function closeQuietly(session: SqlSession): Promise<void> {
  try {
    await session.close();
  } catch (error) {
    console.error(`[Provision] Error closing session on ${session.database}: ${errorMessage(error)}`);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// RUNS
// ═══════════════════════════════════════════════════════════════════════════════

function emptyResult(event: string, state: ProvisioningState): ProvisioningResult {
  return { event, state, exitCode: state === 'failed' ? 1 : 0, roles: [], databases: [] };
}

function failed(result: ProvisioningResult, error: unknown): ProvisioningResult {
  const provisioningError = ProvisioningError.fromUnknown(error, 'DATABASE_ERROR');
  console.error(`[Provision] ${result.event} failed: ${provisioningError.message}`);
  return { ...result, state: 'failed', exitCode: 1, error: provisioningError };
}

async function createAdministrator(
  deps: ProvisioningDeps,
  sessions: DatabaseSessions,
  username: string,
  password: string
): Promise<AdminUserStatus> {
  try {
    const session = await sessions.session('views');
    const store = deps.userStoreFor ? deps.userStoreFor(session) : new PgUserStore(session);
    const status = await store.createUser({
      username,
      longname: username,
      roles: ADMINISTRATOR_ROLES,
      passwordHash: await hashPassword(password),
    });
    console.error(
      status === 'created'
        ? `[Provision] Created administrator ${username}`
        : `[Provision] Administrator ${username} already exists, left unchanged`
    );
    return status;
  } catch (error) {
    console.error(`[Provision] Could not create administrator ${username}: ${errorMessage(error)}`);
    return 'failed';
  }
}

async function freshInstall(
  deps: ProvisioningDeps,
  admin: AdminConnection,
  sessions: DatabaseSessions,
  result: ProvisioningResult
): Promise<ProvisioningResult> {
  for (const role of requiredRoles(deps.config)) {
    result.roles.push(await ensureRole(admin, role));
  }
  for (const spec of requiredDatabases(deps.config)) {
    result.databases.push(await ensureDatabase(admin, spec));
  }

  let credentials: AdminCredentials;
  try {
    credentials = await deps.credentials.getAdminCredentials();
  } catch (error) {
    console.error(`[Provision] No administrator created: ${errorMessage(error)}`);
    result.adminUser = 'failed';
    return result;
  }
  result.adminUser = await createAdministrator(
    deps,
    sessions,
    credentials.username,
    credentials.password
  );
  return result;
}

async function upgrade(
  deps: ProvisioningDeps,
  sessions: DatabaseSessions,
  fromVersion: string,
  result: ProvisioningResult
): Promise<ProvisioningResult> {
  result.migrations = await applyMigrations(fromVersion, deps.steps ?? MIGRATION_STEPS, sessions);

  if (lessThan(fromVersion, LEGACY_IMPORT_THRESHOLD)) {
    let store: UserStore;
    try {
      const session = await sessions.session('views');
      store = deps.userStoreFor ? deps.userStoreFor(session) : new PgUserStore(session);
    } catch (error) {
      console.error(`[LegacyImport] Cannot reach the users table, skipping import: ${errorMessage(error)}`);
      return result;
    }
    result.legacyImport = await new LegacyCredentialImporter(store).importFrom(
      deps.config.legacyCredentialsPath
    );
  }
  return result;
}

/**
 * Record the whole run as best-effort failures when the server cannot be
 * reached: every role, database or pending step is reported failed and the
 * run still completes.
 */
function unreachable(
  deps: ProvisioningDeps,
  fromVersion: string,
  result: ProvisioningResult,
  message: string
): ProvisioningResult {
  console.error(`[Provision] Cannot connect to the server, continuing: ${message}`);

  if (result.state === 'fresh-install') {
    result.roles = requiredRoles(deps.config).map(
      (role): RoleProvisionResult => ({ role, status: 'failed', error: message })
    );
    result.databases = requiredDatabases(deps.config).map((spec): DatabaseProvisionResult => ({
      database: spec.name,
      status: 'failed',
      error: message,
    }));
    result.adminUser = 'failed';
    return result;
  }

  const steps = deps.steps ?? MIGRATION_STEPS;
  assertAscending(steps);
  const plan = planMigrations(fromVersion, steps);
  result.migrations = {
    fromVersion,
    applied: [],
    failed: plan.pending.map((step) => ({ threshold: step.threshold, title: step.title, error: message })),
    skipped: plan.skipped.map((step) => step.threshold),
  };
  return result;
}

/**
 * Run the provisioning work for one life-cycle event
 *
 * Never throws: every failure ends up in the returned result. Database and
 * credential failures are reported and the run still completes; `exitCode`
 * is 1 only for an unknown event, an invalid prior version or a malformed
 * step list. All sessions opened during
 * the run are closed before it returns.
 *
 * @param event - life-cycle event name as passed by the package manager
 * @param priorVersion - version being upgraded from; absent or empty on a fresh install
 */
export async function runLifecycle(
  event: string,
  priorVersion: string | undefined,
  deps: ProvisioningDeps
): Promise<ProvisioningResult> {
  if (isAbortEvent(event)) {
    console.error(`[Provision] ${event}: nothing to do`);
    return emptyResult(event, 'aborted');
  }

  if (!isConfigureEvent(event)) {
    return failed(emptyResult(event, 'failed'), unknownLifecycleEventError(event));
  }

  const fromVersion = priorVersion?.trim() ?? '';
  const state: ProvisioningState = fromVersion === '' ? 'fresh-install' : 'upgrade';
  const result = emptyResult(event, state);

  if (state === 'upgrade' && !isValidVersion(fromVersion)) {
    return failed(result, invalidVersionError(fromVersion));
  }

  let admin: AdminConnection;
  try {
    admin = await deps.connect();
  } catch (error) {
    try {
      return unreachable(deps, fromVersion, result, errorMessage(error));
    } catch (planError) {
      return failed(result, planError);
    }
  }

  const sessions = new DatabaseSessions(admin, deps.config);
  try {
    console.error(
      state === 'fresh-install'
        ? `[Provision] ${event}: fresh install`
        : `[Provision] ${event}: upgrade from ${fromVersion}`
    );
    return state === 'fresh-install'
      ? await freshInstall(deps, admin, sessions, result)
      : await upgrade(deps, sessions, fromVersion, result);
  } catch (error) {
    return failed(result, error);
  } finally {
    await sessions.closeAll();
    await closeQuietly(admin);
  }
}
