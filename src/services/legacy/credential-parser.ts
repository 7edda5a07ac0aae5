/**
 * Legacy Credential File Parser
 *
 * The flat-file store that predates the users table:
 *
 *   USERS
 *   alice:secret1
 *   bob:secret2
 *   GROUP
 *   alice
 *
 * USERS lines are `username:password` with any further `:` fields ignored;
 * GROUP lines name the administrators. A section ends at the next marker,
 * at an INI-style [header] or at end of file. Outside GROUP an all-caps bare
 * word also ends it; inside GROUP that word is an administrator name.
 * Quote and comma characters are stripped before splitting. Anything that
 * does not fit is skipped.
 *
 * @module services/legacy/credential-parser
 */

export type ParserState = 'None' | 'InUsers' | 'InGroup';

export interface LegacyUserRecord {
  username: string;
  password: string;
}

export interface LegacyCredentials {
  users: LegacyUserRecord[];
  administrators: string[];
  /** Lines that were neither blank, comments, markers nor well-formed entries */
  skippedLines: number;
}

export const USERS_MARKER = 'USERS';
export const GROUP_MARKER = 'GROUP';

const SECTION_HEADER = /^\[.*\]$/;
const MARKER_WORD = /^[A-Z][A-Z0-9_]*$/;
const STRIPPED_CHARACTERS = /["',]/g;

/**
 * State reached after reading a line that is a section boundary, or
 * undefined when the line is section content
 */
export function transition(line: string, state: ParserState = 'None'): ParserState | undefined {
  if (line === USERS_MARKER) return 'InUsers';
  if (line === GROUP_MARKER) return 'InGroup';
  if (SECTION_HEADER.test(line)) return 'None';
  if (state !== 'InGroup' && MARKER_WORD.test(line)) return 'None';
  return undefined;
}

function parseUserLine(line: string): LegacyUserRecord | undefined {
  const fields = line.replace(STRIPPED_CHARACTERS, '').split(':');
  if (fields.length < 2) return undefined;

  const username = fields[0].trim();
  const password = fields[1].trim();
  if (username === '' || password === '' || /\s/.test(username)) return undefined;

  return { username, password };
}

function parseGroupLine(line: string): string | undefined {
  const username = line.replace(STRIPPED_CHARACTERS, '').trim();
  if (username === '' || username.includes(':') || /\s/.test(username)) return undefined;
  return username;
}

/**
 * Parse the contents of a legacy credential file
 */
export function parseLegacyCredentials(content: string): LegacyCredentials {
  const result: LegacyCredentials = { users: [], administrators: [], skippedLines: 0 };
  let state: ParserState = 'None';

  for (const rawLine of content.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (line === '' || line.startsWith('#')) {
      continue;
    }

    const next = transition(line, state);
    if (next !== undefined) {
      state = next;
      continue;
    }

    switch (state) {
      case 'InUsers': {
        const record = parseUserLine(line);
        if (record) {
          result.users.push(record);
        } else {
          result.skippedLines++;
        }
        break;
      }
      case 'InGroup': {
        const username = parseGroupLine(line);
        if (username) {
          result.administrators.push(username);
        } else {
          result.skippedLines++;
        }
        break;
      }
      case 'None':
        result.skippedLines++;
        break;
    }
  }

  return result;
}
