/**
 * Legacy Credential Import
 *
 * Moves the flat-file credential store into the users table: every USERS
 * entry becomes (or replaces the password and roles of) a view-only user,
 * then every GROUP entry is raised to the administrator role set.
 * Runs once, on the upgrade that crosses LEGACY_IMPORT_THRESHOLD.
 *
 * @module services/legacy/importer
 */

import fs from 'fs';
import type { UserStore } from '../users/user-store.js';
import { hashPassword } from '../users/password.js';
import { ADMINISTRATOR_ROLES, BASELINE_ROLES } from '../users/roles.js';
import { parseLegacyCredentials } from './credential-parser.js';
import { errorMessage } from '../../utils/errors.js';

/** Upgrades from versions before this one still have the flat-file store */
export const LEGACY_IMPORT_THRESHOLD = '2.6-1';

export type LegacyImportStatus = 'imported' | 'missing';

export interface LegacyImportReport {
  status: LegacyImportStatus;
  usersImported: string[];
  administratorsElevated: string[];
  /** GROUP entries with no matching user */
  unknownAdministrators: string[];
  /** Entries the database refused */
  failed: string[];
  skippedLines: number;
}

function emptyReport(status: LegacyImportStatus): LegacyImportReport {
  return {
    status,
    usersImported: [],
    administratorsElevated: [],
    unknownAdministrators: [],
    failed: [],
    skippedLines: 0,
  };
}

async function readLegacyFile(filePath: string): Promise<string | null> {
  try {
    return await fs.promises.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

export class LegacyCredentialImporter {
  constructor(private readonly users: UserStore) {}

  /**
   * Import the credential file at `filePath`
   *
   * A missing file is not an error: there is nothing to carry forward.
   * Unreadable files and rejected entries are reported, never thrown, so the
   * upgrade always continues.
   */
  async importFrom(filePath: string): Promise<LegacyImportReport> {
    let content: string | null;
    try {
      content = await readLegacyFile(filePath);
    } catch (error) {
      console.error(`[LegacyImport] Cannot read ${filePath}, skipping import: ${errorMessage(error)}`);
      const report = emptyReport('missing');
      report.failed.push(filePath);
      return report;
    }

    if (content === null) {
      console.error(`[LegacyImport] No legacy credential file at ${filePath}, nothing to import`);
      return emptyReport('missing');
    }

    const parsed = parseLegacyCredentials(content);
    const report = emptyReport('imported');
    report.skippedLines = parsed.skippedLines;

    for (const record of parsed.users) {
      try {
        await this.users.upsertUser({
          username: record.username,
          longname: record.username,
          roles: BASELINE_ROLES,
          passwordHash: await hashPassword(record.password),
        });
        report.usersImported.push(record.username);
      } catch (error) {
        report.failed.push(record.username);
        console.error(`[LegacyImport] Could not import user ${record.username}: ${errorMessage(error)}`);
      }
    }

    for (const username of parsed.administrators) {
      try {
        if (await this.users.setRoles(username, ADMINISTRATOR_ROLES)) {
          report.administratorsElevated.push(username);
        } else {
          report.unknownAdministrators.push(username);
          console.error(`[LegacyImport] Administrator ${username} has no user entry, not elevated`);
        }
      } catch (error) {
        report.failed.push(username);
        console.error(`[LegacyImport] Could not elevate ${username}: ${errorMessage(error)}`);
      }
    }

    console.error(
      `[LegacyImport] Imported ${String(report.usersImported.length)} users, ` +
        `elevated ${String(report.administratorsElevated.length)} administrators from ${filePath}`
    );
    return report;
  }
}
