/**
 * Shared types for storage services
 */

import type { SchemaLoadReport } from './schema-loader.js';

/**
 * What a provisioning call did to the target. Callers act on this value
 * instead of querying the server again.
 */
export type ProvisionStatus = 'exists' | 'created' | 'failed';

export interface RoleProvisionResult {
  role: string;
  status: ProvisionStatus;
  error?: string;
}

export interface DatabaseProvisionResult {
  database: string;
  status: ProvisionStatus;
  /** Present when the database was created and its dump was streamed in */
  schema?: SchemaLoadReport;
  error?: string;
}
