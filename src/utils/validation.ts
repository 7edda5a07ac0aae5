/**
 * Storage Provisioner - Zod Validation Schemas
 *
 * Input validation for everything that crosses into the provisioner from
 * outside: environment configuration, command-line arguments and operator
 * supplied credentials.
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { isValidVersion } from './version.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @param schema - Zod schema to validate against
 * @param input - Input value to validate
 * @returns Validated and typed input data
 * @throws ValidationError with descriptive message if validation fails
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Role and database names. Kept to plain lowercase identifiers so they never
 * need more than the driver's identifier quoting.
 */
export const SqlIdentifier = z
  .string()
  .min(1, 'Identifier is required')
  .max(63, 'Identifier must be 63 characters or less')
  .regex(
    /^[a-z_][a-z0-9_-]*$/,
    'Identifier must start with a lowercase letter or underscore and contain only lowercase letters, digits, underscores and hyphens'
  );

/**
 * A package version as handed over by the package manager
 */
export const PackageVersion = z
  .string()
  .min(1, 'Version is required')
  .refine(isValidVersion, (value) => ({ message: `Invalid package version: ${value}` }));

/**
 * Operator supplied credentials for the initial administrator
 */
export const AdminCredentials = z.object({
  username: z
    .string()
    .trim()
    .min(1, 'Administrator username is required')
    .max(128, 'Administrator username must be 128 characters or less')
    .regex(/^[^\s:]+$/, 'Administrator username must not contain whitespace or colons'),
  password: z.string().min(1, 'Administrator password is required'),
});

export type AdminCredentials = z.infer<typeof AdminCredentials>;
