import { exec } from 'node:child_process';

import { logger } from '../ui/logger.js';
import { CommandFailure } from '../utils/errors.js';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface RunCommandOptions {
  /** Throw `CommandFailure` on a non-zero exit. Defaults to true. */
  check?: boolean;
}

export interface CommandRunner {
  readonly cwd: string;
  run(command: string, options?: RunCommandOptions): Promise<CommandResult>;
}

const MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Runs shell command strings inside the workspace. No timeout is applied:
 * a hanging subprocess blocks the caller until it exits.
 */
export class ShellExecutor implements CommandRunner {
  readonly cwd: string;

  constructor(cwd: string) {
    this.cwd = cwd;
  }

  async run(command: string, options: RunCommandOptions = {}): Promise<CommandResult> {
    const check = options.check ?? true;
    logger.info(`Executing: ${command}`);

    const result = await new Promise<CommandResult>((resolve) => {
      const child = exec(command, { cwd: this.cwd, maxBuffer: MAX_BUFFER }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ exitCode: 0, stdout, stderr });
        } else if (typeof error.code === 'number') {
          resolve({ exitCode: error.code, stdout, stderr });
        } else {
          // The process never ran or was cut off (ENOENT, maxBuffer, signal).
          resolve({ exitCode: 1, stdout, stderr: stderr || error.message });
        }
      });
      // Nothing is ever written to the child; a command that reads stdin sees EOF.
      child.stdin?.end();
    });

    if (check && result.exitCode !== 0) {
      logger.error(`Command failed with code ${result.exitCode}: ${result.stderr.trim()}`);
      throw new CommandFailure(command, result.exitCode, result.stdout, result.stderr);
    }

    return result;
  }
}
