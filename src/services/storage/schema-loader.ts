/**
 * Schema Dump Loading
 *
 * Streams a plain SQL dump (gzip-compressed when the file name ends in .gz)
 * into a session one statement at a time. Loading is not transactional: a
 * failing statement is logged and counted and the rest of the dump still
 * runs, the way psql replays a dump by default.
 *
 * Dumps must be taken with INSERT statements rather than COPY ... FROM stdin.
 * psql meta-commands (lines starting with a backslash) are skipped.
 *
 * @module services/storage/schema-loader
 */

import fs from 'fs';
import zlib from 'zlib';
import type { Readable } from 'stream';
import type { SqlSession } from './connection.js';
import { errorMessage } from '../../utils/errors.js';

export interface SchemaLoadReport {
  statementsExecuted: number;
  statementsFailed: number;
  metaCommandsSkipped: number;
}

type SplitterState = 'code' | 'single-quote' | 'double-quote' | 'dollar-quote' | 'block-comment';

/**
 * Incremental SQL statement splitter, fed one line at a time.
 *
 * Splits on semicolons outside string literals, quoted identifiers,
 * dollar-quoted bodies and comments. Comments are kept inside the statement
 * text; statements consisting only of comments are dropped.
 */
export class SqlStatementSplitter {
  private buffer = '';
  private state: SplitterState = 'code';
  private dollarTag = '';
  private commentDepth = 0;
  private skippedMetaCommands = 0;

  get metaCommandsSkipped(): number {
    return this.skippedMetaCommands;
  }

  /**
   * Feed one line (without its line terminator)
   * @returns statements completed by this line
   */
  push(line: string): string[] {
    if (this.state === 'code' && !hasSql(this.buffer) && line.startsWith('\\')) {
      this.skippedMetaCommands++;
      return [];
    }

    const completed: string[] = [];
    let i = 0;

    while (i < line.length) {
      const ch = line[i];
      const next = line.charAt(i + 1);

      switch (this.state) {
        case 'code': {
          if (ch === '-' && next === '-') {
            this.buffer += line.slice(i);
            i = line.length;
            continue;
          }
          if (ch === '/' && next === '*') {
            this.state = 'block-comment';
            this.commentDepth = 1;
            this.buffer += '/*';
            i += 2;
            continue;
          }
          if (ch === "'") {
            this.state = 'single-quote';
          } else if (ch === '"') {
            this.state = 'double-quote';
          } else if (ch === '$') {
            const tag = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/.exec(line.slice(i));
            if (tag) {
              this.state = 'dollar-quote';
              this.dollarTag = tag[0];
              this.buffer += tag[0];
              i += tag[0].length;
              continue;
            }
          } else if (ch === ';') {
            this.emit(completed);
            i++;
            continue;
          }
          this.buffer += ch;
          i++;
          continue;
        }

        case 'single-quote':
        case 'double-quote': {
          const quote = this.state === 'single-quote' ? "'" : '"';
          this.buffer += ch;
          if (ch === quote) {
            if (next === quote) {
              this.buffer += next;
              i += 2;
              continue;
            }
            this.state = 'code';
          }
          i++;
          continue;
        }

        case 'dollar-quote': {
          if (line.startsWith(this.dollarTag, i)) {
            this.buffer += this.dollarTag;
            i += this.dollarTag.length;
            this.state = 'code';
            this.dollarTag = '';
            continue;
          }
          this.buffer += ch;
          i++;
          continue;
        }

        case 'block-comment': {
          if (ch === '/' && next === '*') {
            this.commentDepth++;
            this.buffer += '/*';
            i += 2;
            continue;
          }
          if (ch === '*' && next === '/') {
            this.commentDepth--;
            this.buffer += '*/';
            i += 2;
            if (this.commentDepth === 0) this.state = 'code';
            continue;
          }
          this.buffer += ch;
          i++;
          continue;
        }
      }
    }

    this.buffer += '\n';
    return completed;
  }

  /**
   * Flush whatever is left after the last line
   * @returns the trailing statement, if it has any SQL in it
   */
  finish(): string | undefined {
    const completed: string[] = [];
    this.emit(completed);
    this.state = 'code';
    return completed[0];
  }

  private emit(into: string[]): void {
    const statement = this.buffer.trim();
    this.buffer = '';
    if (statement !== '' && hasSql(statement)) {
      into.push(statement);
    }
  }
}

function hasSql(statement: string): boolean {
  const withoutComments = statement.replace(/\/\*[\s\S]*?\*\//g, '').replace(/--[^\n]*/g, '');
  return withoutComments.trim() !== '';
}

function openDump(dumpPath: string): Readable {
  const file = fs.createReadStream(dumpPath);
  if (!dumpPath.endsWith('.gz')) {
    return file;
  }
  const gunzip = zlib.createGunzip();
  file.on('error', (error) => gunzip.destroy(error));
  return file.pipe(gunzip);
}

async function* readLines(input: Readable): AsyncGenerator<string> {
  input.setEncoding('utf8');
  let pending = '';
  for await (const chunk of input) {
    pending += String(chunk);
    const lines = pending.split(/\r?\n/);
    pending = lines.pop() ?? '';
    yield* lines;
  }
  if (pending !== '') {
    yield pending;
  }
}

async function runStatement(
  session: SqlSession,
  statement: string,
  report: SchemaLoadReport
): Promise<void> {
  try {
    await session.query(statement);
    report.statementsExecuted++;
  } catch (error) {
    report.statementsFailed++;
    console.error(
      `[Schema] ${session.database}: statement failed (${errorMessage(error)}): ${statement.slice(0, 120)}`
    );
  }
}

/**
 * Stream a schema dump into a session
 *
 * @param session - session on the freshly created database
 * @param dumpPath - path to a .sql or .sql.gz file
 * @throws Error if the dump cannot be opened or decompressed
 */
export async function loadSchemaDump(session: SqlSession, dumpPath: string): Promise<SchemaLoadReport> {
  const report: SchemaLoadReport = { statementsExecuted: 0, statementsFailed: 0, metaCommandsSkipped: 0 };
  const splitter = new SqlStatementSplitter();

  await fs.promises.access(dumpPath, fs.constants.R_OK);

  for await (const line of readLines(openDump(dumpPath))) {
    for (const statement of splitter.push(line)) {
      await runStatement(session, statement, report);
    }
  }

  const trailing = splitter.finish();
  if (trailing !== undefined) {
    await runStatement(session, trailing, report);
  }

  report.metaCommandsSkipped = splitter.metaCommandsSkipped;
  console.error(
    `[Schema] ${session.database}: loaded ${dumpPath} ` +
      `(${String(report.statementsExecuted)} statements, ${String(report.statementsFailed)} failed)`
  );
  return report;
}
