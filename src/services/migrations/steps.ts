/**
 * Schema Changes by Release
 *
 * Ordered by threshold. Every statement is guarded so that re-running a step
 * on a database that already has the change does nothing.
 *
 * @module services/migrations/steps
 */

import type { DatabaseKey } from '../../config/config.js';
import { MigrationError, type MigrationStep } from './types.js';
import { errorMessage } from '../../utils/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// STATEMENTS
// ═══════════════════════════════════════════════════════════════════════════════

export const CREATE_USERFILTERS_TABLE = `
CREATE TABLE IF NOT EXISTS userfilters (
  user_id TEXT NOT NULL,
  stream_type TEXT NOT NULL,
  filters TEXT NOT NULL,
  PRIMARY KEY (user_id, stream_type)
)`;

export const ADD_MESH_VISIBILITY_COLUMNS = [
  'ALTER TABLE mesh ADD COLUMN IF NOT EXISTS mesh_is_public BOOLEAN NOT NULL DEFAULT false',
  'ALTER TABLE mesh ADD COLUMN IF NOT EXISTS mesh_is_src BOOLEAN NOT NULL DEFAULT true',
];

export const CREATE_USERS_TABLE = `
CREATE TABLE IF NOT EXISTS users (
  username TEXT PRIMARY KEY NOT NULL,
  longname TEXT NOT NULL,
  roles TEXT[] NOT NULL DEFAULT '{}',
  password TEXT NOT NULL,
  enabled BOOLEAN NOT NULL DEFAULT true
)`;

export const REPLACE_FULL_MESH_DETAILS_VIEW = `
CREATE OR REPLACE VIEW full_mesh_details AS
  SELECT mesh.mesh_name, mesh.mesh_description, mesh.mesh_is_public, mesh.mesh_is_src,
         member.meshmember_name
  FROM mesh
  LEFT JOIN member ON mesh.mesh_name = member.meshmember_meshname`;

export const ADD_USER_EMAIL = [
  'ALTER TABLE users ADD COLUMN IF NOT EXISTS email TEXT',
  'CREATE INDEX IF NOT EXISTS users_enabled_idx ON users (enabled)',
];

export const RELAX_USERFILTERS = [
  'ALTER TABLE userfilters DROP CONSTRAINT IF EXISTS userfilters_user_fkey',
  'ALTER TABLE userfilters ADD COLUMN IF NOT EXISTS created_at TIMESTAMPTZ NOT NULL DEFAULT now()',
];

// ═══════════════════════════════════════════════════════════════════════════════
// STEPS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A step that runs a fixed list of statements, in order, on one database
 *
 * A failing statement is logged and the rest still run; the step then
 * rejects with every failure so the sequencer records it.
 */
export function sqlStep(
  threshold: string,
  title: string,
  database: DatabaseKey,
  statements: string | readonly string[]
): MigrationStep {
  const list = typeof statements === 'string' ? [statements] : statements;
  return {
    threshold,
    title,
    async action(context) {
      const session = await context.session(database);
      const failures: string[] = [];
      for (const statement of list) {
        try {
          await session.query(statement);
        } catch (error) {
          failures.push(errorMessage(error));
          console.error(`[Migration] ${threshold}: statement failed, continuing: ${errorMessage(error)}`);
        }
      }
      if (failures.length > 0) {
        throw new MigrationError(
          `${String(failures.length)} of ${String(list.length)} statements failed: ${failures.join('; ')}`,
          'apply',
          threshold
        );
      }
    },
  };
}

export const MIGRATION_STEPS: readonly MigrationStep[] = [
  sqlStep('2.1-1', 'Create userfilters table', 'views', CREATE_USERFILTERS_TABLE),
  sqlStep('2.4-1', 'Add mesh visibility columns', 'meta', ADD_MESH_VISIBILITY_COLUMNS),
  sqlStep('2.6-1', 'Create users table', 'views', CREATE_USERS_TABLE),
  sqlStep('2.7-1', 'Replace full_mesh_details view', 'meta', REPLACE_FULL_MESH_DETAILS_VIEW),
  sqlStep('2.9-1', 'Add user email and enabled index', 'views', ADD_USER_EMAIL),
  sqlStep('2.13-1', 'Drop userfilters user constraint, add created_at', 'views', RELAX_USERFILTERS),
];
