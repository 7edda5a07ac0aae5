/**
 * PostgreSQL Sessions
 *
 * The provisioner talks to the server through one administrative session
 * (connected to the maintenance database) and opens further sessions on the
 * databases it creates or migrates. Every session runs one statement at a time.
 *
 * @module services/storage/connection
 */

import pg from 'pg';
import type { Client } from 'pg';
import type { ConnectionSettings } from '../../config/config.js';

export type Row = Record<string, unknown>;

export interface QueryOutcome<TRow extends Row = Row> {
  rows: TRow[];
  rowCount: number;
}

export interface SqlSession {
  /** Database this session is connected to */
  readonly database: string;
  query<TRow extends Row = Row>(text: string, params?: readonly unknown[]): Promise<QueryOutcome<TRow>>;
  /** Quote a role or database name for use in DDL */
  escapeIdentifier(name: string): string;
  close(): Promise<void>;
}

export interface AdminConnection extends SqlSession {
  /** Open a session on another database of the same server, with the same credentials */
  openDatabase(name: string): Promise<SqlSession>;
}

class PgSession implements SqlSession {
  constructor(
    public readonly database: string,
    protected readonly client: Client
  ) {}

  async query<TRow extends Row = Row>(
    text: string,
    params?: readonly unknown[]
  ): Promise<QueryOutcome<TRow>> {
    const result = await this.client.query<TRow>(text, params ? [...params] : undefined);
    return { rows: result.rows, rowCount: result.rowCount ?? 0 };
  }

  escapeIdentifier(name: string): string {
    return this.client.escapeIdentifier(name);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

class PgAdminConnection extends PgSession implements AdminConnection {
  constructor(
    database: string,
    client: Client,
    private readonly settings: ConnectionSettings
  ) {
    super(database, client);
  }

  async openDatabase(name: string): Promise<SqlSession> {
    const client = await connectClient(this.settings, name);
    return new PgSession(name, client);
  }
}

async function connectClient(settings: ConnectionSettings, database: string): Promise<Client> {
  const client = new pg.Client({
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database,
    application_name: 'storage-provisioner',
  });
  await client.connect();
  return client;
}

/**
 * Connect to the maintenance database with administrative credentials.
 * Unset connection fields fall back to the driver's PG* environment defaults.
 */
export async function connectAdmin(settings: ConnectionSettings): Promise<AdminConnection> {
  const client = await connectClient(settings, settings.adminDatabase);
  return new PgAdminConnection(settings.adminDatabase, client, settings);
}
