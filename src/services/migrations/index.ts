/**
 * Version-gated schema migrations
 *
 * @module services/migrations
 */

export {
  MigrationError,
  type MigrationContext,
  type MigrationPlan,
  type MigrationReport,
  type MigrationStep,
  type StepFailure,
} from './types.js';

export { applyMigrations, assertAscending, planMigrations } from './sequencer.js';

export { MIGRATION_STEPS, sqlStep } from './steps.js';
