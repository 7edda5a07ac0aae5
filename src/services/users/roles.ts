/**
 * User Capability Tags
 *
 * The web application checks these tags on every request; the provisioner
 * only ever hands out the two fixed sets below.
 *
 * @module services/users/roles
 */

export type UserRole = 'view' | 'view-config' | 'edit-config' | 'edit-users';

/** Granted to ordinary users imported from the legacy credential store */
export const BASELINE_ROLES: readonly UserRole[] = ['view'];

/** Granted to administrators; always a superset of BASELINE_ROLES */
export const ADMINISTRATOR_ROLES: readonly UserRole[] = [
  'view',
  'view-config',
  'edit-config',
  'edit-users',
];

const ALL_ROLES = new Set<string>(ADMINISTRATOR_ROLES);

export function isValidRole(role: string): role is UserRole {
  return ALL_ROLES.has(role);
}
