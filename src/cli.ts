/**
 * Command-line handling
 *
 *   storage-provisioner <event> [prior-version]
 *   storage-provisioner plan <from-version>
 *
 * Log output goes to stderr; stdout carries only the `plan` listing.
 *
 * @module cli
 */

import { loadProvisioningConfig, type ProvisioningConfig } from './config/config.js';
import { EnvCredentialSource } from './config/credentials.js';
import { connectAdmin, type AdminConnection } from './services/storage/connection.js';
import { MIGRATION_STEPS } from './services/migrations/steps.js';
import { assertAscending, planMigrations } from './services/migrations/sequencer.js';
import type { MigrationStep } from './services/migrations/types.js';
import { isConfigureEvent, runLifecycle } from './services/provisioning/orchestrator.js';
import { PackageVersion, validateInput } from './utils/validation.js';
import { ProvisioningError, errorMessage } from './utils/errors.js';

export const USAGE = [
  'Usage: storage-provisioner <event> [prior-version]',
  '       storage-provisioner plan <from-version>',
  '',
  'Events: configure, reconfigure, abort-upgrade, abort-remove, abort-deconfigure',
].join('\n');

export interface CliOptions {
  env?: NodeJS.ProcessEnv;
  /** Replaces the pg connection, for embedding and tests */
  connect?: () => Promise<AdminConnection>;
  steps?: readonly MigrationStep[];
  stdout?: (line: string) => void;
}

function printPlan(
  fromVersion: string,
  steps: readonly MigrationStep[],
  stdout: (line: string) => void
): void {
  assertAscending(steps);
  const plan = planMigrations(fromVersion, steps);
  for (const step of plan.pending) {
    stdout(`pending ${step.threshold} ${step.title}`);
  }
  for (const step of plan.skipped) {
    stdout(`skipped ${step.threshold} ${step.title}`);
  }
}

/**
 * Run the provisioner for the given arguments (without the program name)
 *
 * @returns process exit code
 */
export async function runCli(args: readonly string[], options: CliOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const steps = options.steps ?? MIGRATION_STEPS;
  const stdout = options.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const [command, version] = args;

  if (command === undefined || command === '--help' || command === '-h') {
    console.error(USAGE);
    return command === undefined ? 1 : 0;
  }

  if (command === 'plan') {
    try {
      printPlan(validateInput(PackageVersion, version), steps, stdout);
      return 0;
    } catch (error) {
      console.error(`[Migration] Cannot plan: ${errorMessage(error)}`);
      return 1;
    }
  }

  let config: ProvisioningConfig;
  try {
    // Aborts and unknown events never reach the database, so only a configure
    // run depends on the environment being valid
    config = loadProvisioningConfig(isConfigureEvent(command) ? env : {});
  } catch (error) {
    console.error(`[Provision] ${ProvisioningError.fromUnknown(error).message}`);
    return 1;
  }

  const connect = options.connect ?? (() => connectAdmin(config.connection));
  const result = await runLifecycle(command, version, {
    config,
    connect,
    credentials: new EnvCredentialSource(env),
    steps,
  });

  console.error(
    `[Provision] ${command} finished in state ${result.state} (exit ${String(result.exitCode)})`
  );
  return result.exitCode;
}
