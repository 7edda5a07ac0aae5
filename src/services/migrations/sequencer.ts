/**
 * Migration Sequencer
 *
 * Runs every step whose threshold is not behind the version being upgraded
 * from, in list order. A failing step is logged and recorded; the next step
 * still runs.
 *
 * @module services/migrations/sequencer
 */

import { compareVersions, isValidVersion, lessOrEqual } from '../../utils/version.js';
import { errorMessage } from '../../utils/errors.js';
import {
  MigrationError,
  type MigrationContext,
  type MigrationPlan,
  type MigrationReport,
  type MigrationStep,
} from './types.js';

/**
 * Check the step list is usable: valid thresholds in ascending order
 *
 * @throws MigrationError naming the first offending step
 */
export function assertAscending(steps: readonly MigrationStep[]): void {
  for (let i = 0; i < steps.length; i++) {
    const step = steps[i];
    if (!isValidVersion(step.threshold)) {
      throw new MigrationError(
        `Migration "${step.title}" has an invalid threshold "${step.threshold}"`,
        'validate',
        step.threshold
      );
    }
    if (i > 0 && compareVersions(steps[i - 1].threshold, step.threshold) !== 'LESS') {
      throw new MigrationError(
        `Migration steps out of order: ${steps[i - 1].threshold} is not before ${step.threshold}`,
        'validate',
        step.threshold
      );
    }
  }
}

/**
 * Split steps into those an upgrade from `fromVersion` runs and those it does not
 */
export function planMigrations(fromVersion: string, steps: readonly MigrationStep[]): MigrationPlan {
  const plan: MigrationPlan = { pending: [], skipped: [] };
  for (const step of steps) {
    if (lessOrEqual(fromVersion, step.threshold)) {
      plan.pending.push(step);
    } else {
      plan.skipped.push(step);
    }
  }
  return plan;
}

/**
 * Apply the pending steps for an upgrade from `fromVersion`
 *
 * @throws MigrationError if the step list itself is malformed
 */
export async function applyMigrations(
  fromVersion: string,
  steps: readonly MigrationStep[],
  context: MigrationContext
): Promise<MigrationReport> {
  assertAscending(steps);

  const plan = planMigrations(fromVersion, steps);
  const report: MigrationReport = {
    fromVersion,
    applied: [],
    failed: [],
    skipped: plan.skipped.map((step) => step.threshold),
  };

  console.error(
    `[Migration] Upgrading from ${fromVersion}: ${String(plan.pending.length)} pending, ` +
      `${String(plan.skipped.length)} already applied`
  );

  for (const step of plan.pending) {
    try {
      await step.action(context);
      report.applied.push(step.threshold);
      console.error(`[Migration] ${step.threshold}: ${step.title}`);
    } catch (error) {
      report.failed.push({ threshold: step.threshold, title: step.title, error: errorMessage(error) });
      console.error(`[Migration] ${step.threshold}: ${step.title} failed: ${errorMessage(error)}`);
    }
  }

  return report;
}
