/**
 * Users table repository
 *
 * @module tests/unit/users/user-store
 */

import { describe, it, expect } from 'vitest';
import { PgUserStore } from '../../../src/services/users/user-store.js';
import type { QueryOutcome, Row, SqlSession } from '../../../src/services/storage/connection.js';

interface Call {
  text: string;
  params?: readonly unknown[];
}

/** Session that records queries and answers each with the next queued outcome */
class ScriptedSession implements SqlSession {
  readonly database = 'webviews';
  readonly calls: Call[] = [];

  constructor(private readonly outcomes: QueryOutcome[] = []) {}

  async query<TRow extends Row = Row>(text: string, params?: readonly unknown[]): Promise<QueryOutcome<TRow>> {
    this.calls.push({ text, params });
    const outcome = this.outcomes.shift() ?? { rows: [], rowCount: 0 };
    return { rows: outcome.rows.filter((row): row is TRow => typeof row === 'object'), rowCount: outcome.rowCount };
  }

  escapeIdentifier(name: string): string {
    return `"${name}"`;
  }

  async close(): Promise<void> {}
}

describe('PgUserStore', () => {
  const newUser = {
    username: 'alice',
    longname: 'Alice',
    roles: ['view'] as const,
    passwordHash: '$pbkdf2-sha256$100000$c2FsdA$aGFzaA',
  };

  it('inserts a new user and reports it created', async () => {
    const session = new ScriptedSession([{ rows: [], rowCount: 1 }]);
    await expect(new PgUserStore(session).createUser(newUser)).resolves.toBe('created');

    expect(session.calls[0].text).toMatch(/^INSERT INTO users .*ON CONFLICT \(username\) DO NOTHING$/s);
    expect(session.calls[0].params).toEqual([
      'alice',
      'Alice',
      null,
      ['view'],
      '$pbkdf2-sha256$100000$c2FsdA$aGFzaA',
    ]);
  });

  it('reports an existing user when nothing was inserted', async () => {
    const session = new ScriptedSession([{ rows: [], rowCount: 0 }]);
    await expect(new PgUserStore(session).createUser(newUser)).resolves.toBe('exists');
  });

  it('replaces password and roles on upsert', async () => {
    const session = new ScriptedSession();
    await new PgUserStore(session).upsertUser({ ...newUser, email: 'alice@example.test' });

    expect(session.calls[0].text).toContain(
      'ON CONFLICT (username) DO UPDATE SET password = EXCLUDED.password, roles = EXCLUDED.roles'
    );
    expect(session.calls[0].params?.[2]).toBe('alice@example.test');
  });

  it('reports whether setRoles found the user', async () => {
    const session = new ScriptedSession([
      { rows: [], rowCount: 1 },
      { rows: [], rowCount: 0 },
    ]);
    const store = new PgUserStore(session);

    await expect(store.setRoles('alice', ['view', 'edit-users'])).resolves.toBe(true);
    await expect(store.setRoles('nobody', ['view'])).resolves.toBe(false);
    expect(session.calls[0]).toEqual({
      text: 'UPDATE users SET roles = $2 WHERE username = $1',
      params: ['alice', ['view', 'edit-users']],
    });
  });

  it('maps rows and drops unknown role tags', async () => {
    const session = new ScriptedSession([
      {
        rows: [{ username: 'bob', longname: 'Bob', email: null, roles: ['view', 'superpower'], enabled: true }],
        rowCount: 1,
      },
      { rows: [], rowCount: 0 },
    ]);
    const store = new PgUserStore(session);

    await expect(store.getUser('bob')).resolves.toEqual({
      username: 'bob',
      longname: 'Bob',
      email: null,
      roles: ['view'],
      enabled: true,
    });
    await expect(store.getUser('carol')).resolves.toBeNull();
  });

  it('lists users in name order', async () => {
    const session = new ScriptedSession([
      {
        rows: [
          { username: 'alice', longname: 'Alice', email: null, roles: null, enabled: false },
          { username: 'bob', longname: 'Bob', email: 'bob@example.test', roles: ['view'], enabled: true },
        ],
        rowCount: 2,
      },
    ]);

    const users = await new PgUserStore(session).listUsers();

    expect(session.calls[0].text).toBe(
      'SELECT username, longname, email, roles, enabled FROM users ORDER BY username'
    );
    expect(users.map((u) => [u.username, u.roles, u.enabled])).toEqual([
      ['alice', [], false],
      ['bob', ['view'], true],
    ]);
  });
});
