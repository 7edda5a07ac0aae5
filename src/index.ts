/**
 * Storage Provisioner
 *
 * Library entry point, for running provisioning from another program.
 * The command-line entry point is bin.ts.
 *
 * @module index
 */

export {
  loadProvisioningConfig,
  requiredDatabases,
  requiredRoles,
  type DatabaseKey,
  type DatabaseSpec,
  type ProvisioningConfig,
} from './config/config.js';
export {
  EnvCredentialSource,
  StaticCredentialSource,
  type AdminCredentialSource,
} from './config/credentials.js';

export * from './services/storage/index.js';
export * from './services/migrations/index.js';

export {
  LEGACY_IMPORT_THRESHOLD,
  LegacyCredentialImporter,
  type LegacyImportReport,
} from './services/legacy/importer.js';
export { parseLegacyCredentials, type LegacyCredentials } from './services/legacy/credential-parser.js';

export { PgUserStore, type User, type UserStore } from './services/users/user-store.js';
export { hashPassword, verifyPassword } from './services/users/password.js';
export { ADMINISTRATOR_ROLES, BASELINE_ROLES, type UserRole } from './services/users/roles.js';

export {
  runLifecycle,
  type ProvisioningDeps,
  type ProvisioningResult,
  type ProvisioningState,
} from './services/provisioning/orchestrator.js';

export { compareVersions, lessOrEqual, lessThan, isValidVersion } from './utils/version.js';
export { ProvisioningError, ERROR_POLICIES, policyFor } from './utils/errors.js';

export { runCli } from './cli.js';
