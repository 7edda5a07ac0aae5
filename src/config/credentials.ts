/**
 * Initial Administrator Credentials
 *
 * The operator prompt lives outside the provisioner; whatever collects the
 * answers hands them over through an AdminCredentialSource. Only a fresh
 * install ever asks for them.
 *
 * @module config/credentials
 */

import { AdminCredentials, ValidationError, validateInput } from '../utils/validation.js';
import { configurationError } from '../utils/errors.js';

export interface AdminCredentialSource {
  getAdminCredentials(): Promise<AdminCredentials>;
}

function checked(raw: { username: string | undefined; password: string | undefined }): AdminCredentials {
  try {
    return validateInput(AdminCredentials, raw);
  } catch (error) {
    if (error instanceof ValidationError) {
      throw configurationError(`Initial administrator credentials are unusable: ${error.message}`);
    }
    throw error;
  }
}

/**
 * Reads PROVISION_ADMIN_USERNAME and PROVISION_ADMIN_PASSWORD, which the
 * package's configuration front end exports before invoking the provisioner.
 */
export class EnvCredentialSource implements AdminCredentialSource {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async getAdminCredentials(): Promise<AdminCredentials> {
    return checked({
      username: this.env.PROVISION_ADMIN_USERNAME,
      password: this.env.PROVISION_ADMIN_PASSWORD,
    });
  }
}

/** Fixed credentials, for embedding the provisioner in another program */
export class StaticCredentialSource implements AdminCredentialSource {
  constructor(private readonly credentials: AdminCredentials) {}

  async getAdminCredentials(): Promise<AdminCredentials> {
    return checked(this.credentials);
  }
}
