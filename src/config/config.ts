/**
 * Provisioner Configuration
 *
 * Read from the environment (optionally populated from a .env file by the
 * CLI entry point) and validated once. Connection fields left unset fall
 * through to the pg driver, which reads PGHOST/PGPORT/PGUSER/PGPASSWORD itself.
 *
 * @module config/config
 */

import path from 'path';
import { z } from 'zod';
import { SqlIdentifier, ValidationError, validateInput } from '../utils/validation.js';
import { configurationError } from '../utils/errors.js';

export const DEFAULT_SCHEMA_DIR = '/usr/share/storage-provisioner/schema';
export const DEFAULT_LEGACY_CREDENTIALS_PATH = '/etc/storage-provisioner/users.conf';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

export const ProvisioningConfigSchema = z.object({
  connection: z.object({
    host: optionalString,
    port: z.coerce.number().int().min(1).max(65535).optional(),
    user: optionalString,
    password: optionalString,
    adminDatabase: SqlIdentifier.default('postgres'),
  }),
  appRole: SqlIdentifier.default('webapp'),
  viewsDatabase: SqlIdentifier.default('webviews'),
  metaDatabase: SqlIdentifier.default('meshmeta'),
  schemaDir: z.string().min(1).default(DEFAULT_SCHEMA_DIR),
  legacyCredentialsPath: z.string().min(1).default(DEFAULT_LEGACY_CREDENTIALS_PATH),
});

export type ProvisioningConfig = z.infer<typeof ProvisioningConfigSchema>;
export type ConnectionSettings = ProvisioningConfig['connection'];

/**
 * Databases the web application needs, keyed by the role they play.
 */
export type DatabaseKey = 'views' | 'meta';

export interface DatabaseSpec {
  readonly key: DatabaseKey;
  readonly name: string;
  readonly owner: string;
  readonly schemaDump: string;
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build the configuration from environment variables
 *
 * @throws ProvisioningError (CONFIGURATION_ERROR) if a value fails validation
 */
export function loadProvisioningConfig(env: NodeJS.ProcessEnv = process.env): ProvisioningConfig {
  const raw = {
    connection: {
      host: env.PGHOST,
      port: emptyToUndefined(env.PGPORT),
      user: env.PGUSER,
      password: env.PGPASSWORD,
      adminDatabase: emptyToUndefined(env.PROVISION_ADMIN_DATABASE),
    },
    appRole: emptyToUndefined(env.PROVISION_APP_ROLE),
    viewsDatabase: emptyToUndefined(env.PROVISION_VIEWS_DATABASE),
    metaDatabase: emptyToUndefined(env.PROVISION_META_DATABASE),
    schemaDir: emptyToUndefined(env.PROVISION_SCHEMA_DIR),
    legacyCredentialsPath: emptyToUndefined(env.PROVISION_LEGACY_CREDENTIALS),
  };

  try {
    return validateInput(ProvisioningConfigSchema, raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw configurationError(`Invalid provisioning configuration: ${error.message}`);
    }
    throw error;
  }
}

/** Roles that must exist before any database is created */
export function requiredRoles(config: ProvisioningConfig): string[] {
  return [config.appRole];
}

/** Databases created on a fresh install, in creation order */
export function requiredDatabases(config: ProvisioningConfig): DatabaseSpec[] {
  return [
    {
      key: 'views',
      name: config.viewsDatabase,
      owner: config.appRole,
      schemaDump: path.join(config.schemaDir, 'views.sql.gz'),
    },
    {
      key: 'meta',
      name: config.metaDatabase,
      owner: config.appRole,
      schemaDump: path.join(config.schemaDir, 'meta.sql.gz'),
    },
  ];
}

export function databaseName(config: ProvisioningConfig, key: DatabaseKey): string {
  return key === 'views' ? config.viewsDatabase : config.metaDatabase;
}
