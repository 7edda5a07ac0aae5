/**
 * Storage Service Module
 *
 * PostgreSQL sessions, role and database provisioning, schema dump loading.
 */

export {
  connectAdmin,
  type AdminConnection,
  type QueryOutcome,
  type Row,
  type SqlSession,
} from './connection.js';

export { ensureRole, roleExists } from './roles.js';
export { ensureDatabase, listDatabases } from './databases.js';
export { SqlStatementSplitter, loadSchemaDump, type SchemaLoadReport } from './schema-loader.js';

export type {
  DatabaseProvisionResult,
  ProvisionStatus,
  RoleProvisionResult,
} from './types.js';
