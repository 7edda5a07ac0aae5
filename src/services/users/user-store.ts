/**
 * Users Table Repository
 *
 * The provisioner creates users (initial administrator, legacy import) and
 * elevates roles during the legacy import. Everything else about a user
 * belongs to the web application.
 *
 * @module services/users/user-store
 */

import type { SqlSession } from '../storage/connection.js';
import { isValidRole, type UserRole } from './roles.js';

export interface User {
  username: string;
  longname: string;
  email: string | null;
  roles: UserRole[];
  enabled: boolean;
}

export interface NewUser {
  username: string;
  longname: string;
  email?: string | null;
  roles: readonly UserRole[];
  /** Already hashed; plaintext never reaches the store */
  passwordHash: string;
}

export type CreateUserStatus = 'created' | 'exists';

export interface UserStore {
  /** Insert a user; an existing user with the same name is left as it is */
  createUser(user: NewUser): Promise<CreateUserStatus>;
  /** Insert a user, or replace the password and roles of an existing one */
  upsertUser(user: NewUser): Promise<void>;
  /** Replace the role set of an existing user; false when there is no such user */
  setRoles(username: string, roles: readonly UserRole[]): Promise<boolean>;
  getUser(username: string): Promise<User | null>;
  listUsers(): Promise<User[]>;
}

type UserRow = {
  username: string;
  longname: string;
  email: string | null;
  roles: string[] | null;
  enabled: boolean;
};

function mapRow(row: UserRow): User {
  return {
    username: row.username,
    longname: row.longname,
    email: row.email,
    roles: (row.roles ?? []).filter(isValidRole),
    enabled: row.enabled,
  };
}

const USER_COLUMNS = 'username, longname, email, roles, enabled';

/**
 * UserStore backed by the `users` table of the views database
 */
export class PgUserStore implements UserStore {
  constructor(private readonly session: SqlSession) {}

  async createUser(user: NewUser): Promise<CreateUserStatus> {
    const result = await this.session.query(
      `INSERT INTO users (username, longname, email, roles, password, enabled)
       VALUES ($1, $2, $3, $4, $5, true)
       ON CONFLICT (username) DO NOTHING`,
      [user.username, user.longname, user.email ?? null, [...user.roles], user.passwordHash]
    );
    return result.rowCount > 0 ? 'created' : 'exists';
  }

  async upsertUser(user: NewUser): Promise<void> {
    await this.session.query(
      `INSERT INTO users (username, longname, email, roles, password, enabled)
       VALUES ($1, $2, $3, $4, $5, true)
       ON CONFLICT (username) DO UPDATE SET password = EXCLUDED.password, roles = EXCLUDED.roles`,
      [user.username, user.longname, user.email ?? null, [...user.roles], user.passwordHash]
    );
  }

  async setRoles(username: string, roles: readonly UserRole[]): Promise<boolean> {
    const result = await this.session.query('UPDATE users SET roles = $2 WHERE username = $1', [
      username,
      [...roles],
    ]);
    return result.rowCount > 0;
  }

  async getUser(username: string): Promise<User | null> {
    const result = await this.session.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE username = $1`,
      [username]
    );
    const row = result.rows[0];
    return row ? mapRow(row) : null;
  }

  async listUsers(): Promise<User[]> {
    const result = await this.session.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users ORDER BY username`
    );
    return result.rows.map(mapRow);
  }
}
