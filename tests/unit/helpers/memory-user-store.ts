/**
 * In-memory UserStore
 *
 * @module tests/unit/helpers/memory-user-store
 */

import type {
  CreateUserStatus,
  NewUser,
  User,
  UserStore,
} from '../../../src/services/users/user-store.js';
import type { UserRole } from '../../../src/services/users/roles.js';

export interface StoredUser extends User {
  password: string;
}

export class MemoryUserStore implements UserStore {
  readonly rows = new Map<string, StoredUser>();
  /** Usernames whose writes throw */
  readonly rejecting = new Set<string>();

  async createUser(user: NewUser): Promise<CreateUserStatus> {
    this.guard(user.username);
    if (this.rows.has(user.username)) return 'exists';
    this.rows.set(user.username, toStored(user));
    return 'created';
  }

  async upsertUser(user: NewUser): Promise<void> {
    this.guard(user.username);
    const existing = this.rows.get(user.username);
    if (existing) {
      existing.password = user.passwordHash;
      existing.roles = [...user.roles];
    } else {
      this.rows.set(user.username, toStored(user));
    }
  }

  async setRoles(username: string, roles: readonly UserRole[]): Promise<boolean> {
    this.guard(username);
    const existing = this.rows.get(username);
    if (!existing) return false;
    existing.roles = [...roles];
    return true;
  }

  async getUser(username: string): Promise<User | null> {
    const row = this.rows.get(username);
    return row ? withoutPassword(row) : null;
  }

  async listUsers(): Promise<User[]> {
    return [...this.rows.values()]
      .sort((a, b) => a.username.localeCompare(b.username))
      .map(withoutPassword);
  }

  private guard(username: string): void {
    if (this.rejecting.has(username)) {
      throw new Error(`write rejected for ${username}`);
    }
  }
}

function toStored(user: NewUser): StoredUser {
  return {
    username: user.username,
    longname: user.longname,
    email: user.email ?? null,
    roles: [...user.roles],
    enabled: true,
    password: user.passwordHash,
  };
}

function withoutPassword(row: StoredUser): User {
  return {
    username: row.username,
    longname: row.longname,
    email: row.email,
    roles: [...row.roles],
    enabled: row.enabled,
  };
}
