/**
 * SQL dump splitting and loading
 *
 * @module tests/unit/storage/schema-loader
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { gzipSync } from 'zlib';
import { SqlStatementSplitter, loadSchemaDump } from '../../../src/services/storage/schema-loader.js';
import { FakePostgres } from '../helpers/fake-postgres.js';

function split(sql: string): string[] {
  const splitter = new SqlStatementSplitter();
  const statements: string[] = [];
  for (const line of sql.split('\n')) {
    statements.push(...splitter.push(line));
  }
  const trailing = splitter.finish();
  if (trailing !== undefined) statements.push(trailing);
  return statements;
}

describe('SqlStatementSplitter', () => {
  it('splits on semicolons at the end of statements', () => {
    expect(split('CREATE TABLE a (id INT);\nCREATE TABLE b (id INT);')).toEqual([
      'CREATE TABLE a (id INT)',
      'CREATE TABLE b (id INT)',
    ]);
  });

  it('joins statements that span several lines', () => {
    expect(split('CREATE TABLE a (\n  id INT\n);')).toEqual(['CREATE TABLE a (\n  id INT\n)']);
  });

  it('keeps semicolons inside string literals and quoted identifiers', () => {
    expect(split("INSERT INTO t VALUES ('a;b', 'it''s;');\nSELECT \"odd;name\" FROM t;")).toEqual([
      "INSERT INTO t VALUES ('a;b', 'it''s;')",
      'SELECT "odd;name" FROM t',
    ]);
  });

  it('keeps dollar-quoted function bodies whole', () => {
    const sql = [
      'CREATE FUNCTION f() RETURNS int AS $body$',
      'BEGIN',
      '  RETURN 1;',
      'END;',
      '$body$ LANGUAGE plpgsql;',
      'SELECT $$a;b$$;',
    ].join('\n');
    expect(split(sql)).toEqual([
      'CREATE FUNCTION f() RETURNS int AS $body$\nBEGIN\n  RETURN 1;\nEND;\n$body$ LANGUAGE plpgsql',
      'SELECT $$a;b$$',
    ]);
  });

  it('ignores semicolons in comments and drops comment-only statements', () => {
    const sql = [
      '-- header; not a statement',
      'SELECT 1; -- trailing; comment',
      '/* block; /* nested; */ still comment; */',
      'SELECT 2;',
    ].join('\n');
    expect(split(sql)).toEqual([
      '-- header; not a statement\nSELECT 1',
      '-- trailing; comment\n/* block; /* nested; */ still comment; */\nSELECT 2',
    ]);
  });

  it('skips psql meta-commands between statements', () => {
    const splitter = new SqlStatementSplitter();
    expect(splitter.push('\\connect webviews')).toEqual([]);
    expect(splitter.push('SELECT 1;')).toEqual(['SELECT 1']);
    expect(splitter.push("\\set ON_ERROR_STOP on")).toEqual([]);
    expect(splitter.metaCommandsSkipped).toBe(2);
  });

  it('returns an unterminated trailing statement from finish()', () => {
    const splitter = new SqlStatementSplitter();
    expect(splitter.push('SELECT 1')).toEqual([]);
    expect(splitter.finish()).toBe('SELECT 1');
    expect(splitter.finish()).toBeUndefined();
  });
});

describe('loadSchemaDump', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'schema-loader-'));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  const dump = [
    'SET client_encoding = \'UTF8\';',
    '\\connect webviews',
    'CREATE TABLE streams (',
    '  id INTEGER PRIMARY KEY',
    ');',
    "INSERT INTO streams VALUES (1);",
  ].join('\n');

  it('loads a plain SQL dump statement by statement', async () => {
    const path = join(dir, 'views.sql');
    writeFileSync(path, dump);
    const server = new FakePostgres({ databases: { webviews: 'webapp' } });
    const session = await (await server.connect()).openDatabase('webviews');

    const report = await loadSchemaDump(session, path);

    expect(report).toEqual({ statementsExecuted: 3, statementsFailed: 0, metaCommandsSkipped: 1 });
    expect(server.statementsOn('webviews')).toEqual([
      "SET client_encoding = 'UTF8'",
      'CREATE TABLE streams (\n  id INTEGER PRIMARY KEY\n)',
      'INSERT INTO streams VALUES (1)',
    ]);
  });

  it('decompresses gzip dumps', async () => {
    const path = join(dir, 'views.sql.gz');
    writeFileSync(path, gzipSync(Buffer.from(dump, 'utf8')));
    const server = new FakePostgres({ databases: { webviews: 'webapp' } });
    const session = await (await server.connect()).openDatabase('webviews');

    const report = await loadSchemaDump(session, path);

    expect(report.statementsExecuted).toBe(3);
    expect(server.statementsOn('webviews')[2]).toBe('INSERT INTO streams VALUES (1)');
  });

  it('counts failing statements and carries on', async () => {
    const path = join(dir, 'views.sql');
    writeFileSync(path, dump);
    const server = new FakePostgres({ databases: { webviews: 'webapp' } }).failOn(/^CREATE TABLE/);
    const session = await (await server.connect()).openDatabase('webviews');

    const report = await loadSchemaDump(session, path);

    expect(report).toEqual({ statementsExecuted: 2, statementsFailed: 1, metaCommandsSkipped: 1 });
    expect(server.statementsOn('webviews')).toHaveLength(3);
  });

  it('rejects when the dump does not exist', async () => {
    const server = new FakePostgres({ databases: { webviews: 'webapp' } });
    const session = await (await server.connect()).openDatabase('webviews');

    await expect(loadSchemaDump(session, join(dir, 'missing.sql.gz'))).rejects.toThrow(/ENOENT/);
    expect(server.statementsOn('webviews')).toEqual([]);
  });

  it('rejects when a .gz file is not gzip data', async () => {
    const path = join(dir, 'broken.sql.gz');
    writeFileSync(path, 'SELECT 1;');
    const server = new FakePostgres({ databases: { webviews: 'webapp' } });
    const session = await (await server.connect()).openDatabase('webviews');

    await expect(loadSchemaDump(session, path)).rejects.toThrow();
  });
});
