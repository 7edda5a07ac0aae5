/**
 * Role Provisioning
 *
 * Best effort: a failure to look up or create a role is logged and reported,
 * never thrown. Failing a whole upgrade over a role that most likely already
 * exists is worse than carrying on.
 *
 * @module services/storage/roles
 */

import type { SqlSession } from './connection.js';
import type { RoleProvisionResult } from './types.js';
import { classifyDatabaseFailure, errorMessage, policyFor } from '../../utils/errors.js';

/**
 * Check whether a role exists
 */
export async function roleExists(admin: SqlSession, name: string): Promise<boolean> {
  const result = await admin.query<{ present: number }>(
    'SELECT 1 AS present FROM pg_roles WHERE rolname = $1',
    [name]
  );
  return result.rows.length > 0;
}

/**
 * Ensure a login role exists without superuser, database or role creation rights.
 * Safe to call repeatedly.
 */
export async function ensureRole(admin: SqlSession, name: string): Promise<RoleProvisionResult> {
  try {
    if (await roleExists(admin, name)) {
      return { role: name, status: 'exists' };
    }

    await admin.query(
      `CREATE ROLE ${admin.escapeIdentifier(name)} LOGIN NOSUPERUSER NOCREATEDB NOCREATEROLE`
    );
    console.error(`[Provision] Created role ${name}`);
    return { role: name, status: 'created' };
  } catch (error) {
    if (policyFor(classifyDatabaseFailure(error)) === 'ignore') {
      return { role: name, status: 'exists' };
    }
    const message = errorMessage(error);
    console.error(`[Provision] Could not ensure role ${name}, continuing: ${message}`);
    return { role: name, status: 'failed', error: message };
  }
}
