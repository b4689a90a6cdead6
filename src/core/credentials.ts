import { chmod, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

export const CREDENTIALS_FILENAME = '.git-credentials';

/** Keeps the stored credential out of status snapshots and staging. */
export const CREDENTIALS_PATHSPEC = `:(exclude)${CREDENTIALS_FILENAME}`;

/**
 * Persists a token for non-interactive reuse by git. Call sites only see
 * `location`, so a keychain or secret-manager backend can replace the file.
 */
export interface CredentialStore {
  readonly location: string;
  store(token: string): Promise<void>;
}

export class FileCredentialStore implements CredentialStore {
  readonly location: string;
  private readonly host: string;

  constructor(workspace: string, host = 'github.com') {
    this.location = join(workspace, CREDENTIALS_FILENAME);
    this.host = host;
  }

  async store(token: string): Promise<void> {
    await writeFile(this.location, `https://${token}:x-oauth-basic@${this.host}\n`, {
      encoding: 'utf-8',
      mode: 0o600,
    });
    // `mode` only applies when the file is created.
    await chmod(this.location, 0o600);
  }
}
