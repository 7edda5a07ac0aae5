/**
 * Database Provisioning
 *
 * A database is created once and then owned by the migration steps: if it is
 * already there nothing is loaded into it, whatever state it is in.
 *
 * @module services/storage/databases
 */

import type { AdminConnection } from './connection.js';
import type { DatabaseProvisionResult } from './types.js';
import type { DatabaseSpec } from '../../config/config.js';
import { loadSchemaDump } from './schema-loader.js';
import { classifyDatabaseFailure, errorMessage, policyFor } from '../../utils/errors.js';

/**
 * Names of all databases on the server
 */
export async function listDatabases(admin: AdminConnection): Promise<string[]> {
  const result = await admin.query<{ datname: string }>(
    'SELECT datname FROM pg_database WHERE NOT datistemplate ORDER BY datname'
  );
  return result.rows.map((row) => row.datname);
}

/**
 * Ensure a database exists; on creation, stream its schema dump into it.
 *
 * Returns `exists` without touching the dump when the database is already
 * present, and `failed` when it could not be created or its dump could not
 * be read. Statement failures inside the dump are counted in `schema`.
 */
export async function ensureDatabase(
  admin: AdminConnection,
  spec: DatabaseSpec
): Promise<DatabaseProvisionResult> {
  try {
    const existing = await listDatabases(admin);
    if (existing.includes(spec.name)) {
      return { database: spec.name, status: 'exists' };
    }

    await admin.query(
      `CREATE DATABASE ${admin.escapeIdentifier(spec.name)} OWNER ${admin.escapeIdentifier(spec.owner)}`
    );
    console.error(`[Provision] Created database ${spec.name} owned by ${spec.owner}`);
  } catch (error) {
    if (policyFor(classifyDatabaseFailure(error)) === 'ignore') {
      return { database: spec.name, status: 'exists' };
    }
    const message = errorMessage(error);
    console.error(`[Provision] Could not create database ${spec.name}, continuing: ${message}`);
    return { database: spec.name, status: 'failed', error: message };
  }

  try {
    const session = await admin.openDatabase(spec.name);
    try {
      const schema = await loadSchemaDump(session, spec.schemaDump);
      return { database: spec.name, status: 'created', schema };
    } finally {
      await session.close();
    }
  } catch (error) {
    const message = errorMessage(error);
    console.error(
      `[Provision] Database ${spec.name} was created but its schema could not be loaded from ${spec.schemaDump}: ${message}`
    );
    return { database: spec.name, status: 'failed', error: message };
  }
}
