/**
 * Migration Types
 *
 * @module services/migrations/types
 */

import type { DatabaseKey } from '../../config/config.js';
import type { SqlSession } from '../storage/connection.js';

/**
 * Error for a migration list or step that cannot be run at all
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly target?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }
}

/**
 * What a step can reach: a session on any of the configured databases.
 * Sessions are opened on first use and closed by whoever owns the context.
 */
export interface MigrationContext {
  session(key: DatabaseKey): Promise<SqlSession>;
}

/**
 * One version-gated schema change
 *
 * `threshold` is the first package version that ships the change; the step
 * runs on every upgrade from a version at or below it. Actions must be
 * idempotent, since a step at exactly the prior version runs again.
 */
export interface MigrationStep {
  readonly threshold: string;
  readonly title: string;
  action(context: MigrationContext): Promise<void>;
}

export interface StepFailure {
  threshold: string;
  title: string;
  error: string;
}

export interface MigrationPlan {
  pending: MigrationStep[];
  skipped: MigrationStep[];
}

export interface MigrationReport {
  fromVersion: string;
  /** Thresholds of the steps that completed, in the order they ran */
  applied: string[];
  failed: StepFailure[];
  /** Thresholds behind the prior version */
  skipped: string[];
}
