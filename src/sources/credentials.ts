/**
 * OAuth credential lookup
 *
 * Reads the access token the CLI login stored at
 * `claudeAiOauth.accessToken` in the credentials file.
 */

import { readFileSync } from 'fs';
import { config } from '../config.js';
import { CredentialsUnavailableError } from '../errors.js';
import { firstString } from '../utils/fields.js';

export interface TokenProvider {
  getToken(): string;
}

export class FileTokenProvider implements TokenProvider {
  constructor(readonly path: string = config.paths.credentials) {}

  /**
   * @throws CredentialsUnavailableError when the file or the token is missing
   */
  getToken(): string {
    let raw: string;
    try {
      raw = readFileSync(this.path, 'utf-8');
    } catch {
      throw new CredentialsUnavailableError(`no credentials file at ${this.path}`);
    }

    let doc: unknown;
    try {
      doc = JSON.parse(raw);
    } catch {
      throw new CredentialsUnavailableError(`credentials file ${this.path} is not valid JSON`);
    }

    const token = firstString(doc, 'claudeAiOauth.accessToken');
    if (!token) {
      throw new CredentialsUnavailableError('no claudeAiOauth.accessToken in credentials file');
    }
    return token;
  }
}
