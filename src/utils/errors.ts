/**
 * Provisioning Error Handling
 *
 * Every failure the provisioner can observe is classified twice:
 * by category (what went wrong) and by error class (what the run does about it).
 * The class-to-policy table is the single place that decides whether a failure
 * is ignored, logged and continued past, skipped silently, or fatal.
 *
 * @module utils/errors
 */

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR CATEGORIES
// ═══════════════════════════════════════════════════════════════════════════════

export type ErrorCategory =
  // Input errors
  | 'VALIDATION_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'UNKNOWN_LIFECYCLE_EVENT'

  // Database errors
  | 'DATABASE_ERROR'
  | 'SCHEMA_LOAD_ERROR'
  | 'MIGRATION_ERROR'

  // Legacy credential errors
  | 'LEGACY_IMPORT_ERROR'

  // Internal errors
  | 'INTERNAL_ERROR';

const ERROR_NAME_TO_CATEGORY: Record<string, ErrorCategory> = {
  ValidationError: 'VALIDATION_ERROR',
  MigrationError: 'MIGRATION_ERROR',
};

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR POLICY
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Error classes observed during a provisioning run.
 */
export type ErrorClass = 'benign-idempotency' | 'best-effort-migration' | 'legacy-parse' | 'control';

/**
 * - ignore: expected, nothing is reported
 * - continue: logged, the run moves on to the next unit of work
 * - skip: dropped without being surfaced
 * - fail-fast: the run stops in the failed state
 */
export type ErrorPolicy = 'ignore' | 'continue' | 'skip' | 'fail-fast';

export const ERROR_POLICIES: Readonly<Record<ErrorClass, ErrorPolicy>> = {
  'benign-idempotency': 'ignore',
  'best-effort-migration': 'continue',
  'legacy-parse': 'skip',
  control: 'fail-fast',
};

export function policyFor(errorClass: ErrorClass): ErrorPolicy {
  return ERROR_POLICIES[errorClass];
}

/**
 * PostgreSQL SQLSTATE codes raised when the object being created already exists:
 * duplicate_object, duplicate_database, duplicate_table, duplicate_column.
 */
const ALREADY_EXISTS_CODES = new Set(['42710', '42P04', '42P07', '42701']);

/**
 * Extract the SQLSTATE code from a driver error, if it carries one
 */
export function sqlStateOf(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * True when the error only says the object is already there.
 */
export function isAlreadyExistsError(error: unknown): boolean {
  const code = sqlStateOf(error);
  return code !== undefined && ALREADY_EXISTS_CODES.has(code);
}

/**
 * Classify a database failure raised while creating or altering an object.
 */
export function classifyDatabaseFailure(error: unknown): ErrorClass {
  return isAlreadyExistsError(error) ? 'benign-idempotency' : 'best-effort-migration';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROVISIONING ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Structured error for failures that end a provisioning run.
 */
export class ProvisioningError extends Error {
  public readonly category: ErrorCategory;
  public readonly details?: Record<string, unknown>;

  constructor(category: ErrorCategory, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ProvisioningError';
    this.category = category;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProvisioningError);
    }
  }

  /**
   * Create error from unknown caught value
   */
  static fromUnknown(
    error: unknown,
    defaultCategory: ErrorCategory = 'INTERNAL_ERROR'
  ): ProvisioningError {
    if (error instanceof ProvisioningError) {
      return error;
    }

    if (error instanceof Error) {
      const category = ERROR_NAME_TO_CATEGORY[error.name] ?? defaultCategory;
      const code = sqlStateOf(error);
      return new ProvisioningError(category, error.message, {
        originalName: error.name,
        ...(code !== undefined ? { sqlState: code } : {}),
        stack: error.stack,
      });
    }

    return new ProvisioningError(defaultCategory, String(error), {
      originalValue: error,
    });
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      category: this.category,
      message: this.message,
      details: this.details,
    };
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// ERROR FACTORY FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export function configurationError(
  message: string,
  details?: Record<string, unknown>
): ProvisioningError {
  return new ProvisioningError('CONFIGURATION_ERROR', message, details);
}

export function unknownLifecycleEventError(event: string): ProvisioningError {
  return new ProvisioningError(
    'UNKNOWN_LIFECYCLE_EVENT',
    `Unrecognized life-cycle event "${event}"`,
    { event }
  );
}

export function invalidVersionError(version: string): ProvisioningError {
  return new ProvisioningError('VALIDATION_ERROR', `Invalid package version "${version}"`, {
    version,
  });
}
