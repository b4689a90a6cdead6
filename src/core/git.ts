import { CREDENTIALS_PATHSPEC } from './credentials.js';
import type { CommandRunner } from './executor.js';
import { quoteShellArg } from '../utils/shell.js';

const SCOPE = `-- . ${quoteShellArg(CREDENTIALS_PATHSPEC)}`;

/**
 * The git commands the workflow issues, expressed through a `CommandRunner`
 * so every one of them is logged and checked the same way.
 */
export class GitClient {
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner) {
    this.runner = runner;
  }

  async configureIdentity(name: string, email: string): Promise<void> {
    await this.runner.run(`git config user.name ${quoteShellArg(name)}`);
    await this.runner.run(`git config user.email ${quoteShellArg(email)}`);
  }

  async useCredentialFile(path: string): Promise<void> {
    await this.runner.run(`git config credential.helper ${quoteShellArg(`store --file=${path}`)}`);
  }

  /**
   * Check out and update the base branch, trying `master` before `main`.
   * Each pair runs as one shell OR, so only a double failure is reported.
   */
  async checkoutBase(): Promise<void> {
    await this.runner.run('git checkout master || git checkout main');
    await this.runner.run('git pull origin master || git pull origin main');
  }

  async createBranch(branchName: string): Promise<void> {
    await this.runner.run(`git checkout -b ${quoteShellArg(branchName)}`);
  }

  /** Porcelain status of the workspace. Never throws on a non-zero exit. */
  async status(): Promise<string> {
    const { stdout } = await this.runner.run(`git status --porcelain ${SCOPE}`, { check: false });
    return stdout;
  }

  async hasPendingChanges(): Promise<boolean> {
    return (await this.status()).trim().length > 0;
  }

  async stageAll(): Promise<void> {
    await this.runner.run(`git add --all ${SCOPE}`);
  }

  async commit(message: string): Promise<void> {
    await this.runner.run(`git commit -m ${quoteShellArg(message)}`);
  }

  async push(branchName: string): Promise<void> {
    await this.runner.run(`git push -u origin ${quoteShellArg(branchName)}`);
  }
}
