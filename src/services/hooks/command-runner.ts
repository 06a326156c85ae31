/**
 * Runs external tools (trufflehog, pre-commit) and reports their output
 */

import { execFile } from 'child_process';
import { NotFoundError } from '../../core/errors.js';

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandRunOptions {
  cwd?: string;
}

export interface CommandRunner {
  /**
   * Run a command to completion. A non-zero exit resolves with its code;
   * a missing executable rejects with NotFoundError.
   */
  run(command: string, args: string[], options?: CommandRunOptions): Promise<CommandResult>;
}

/**
 * CommandRunner backed by child_process.execFile (no shell)
 */
export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: string[], options: CommandRunOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
      execFile(command, args, { cwd: options.cwd, encoding: 'utf-8' }, (error, stdout, stderr) => {
        if (!error) {
          resolve({ stdout, stderr, exitCode: 0 });
          return;
        }
        const code: unknown = error.code;
        if (code === 'ENOENT') {
          reject(new NotFoundError('Command', command));
        } else if (typeof code === 'number') {
          resolve({ stdout, stderr, exitCode: code });
        } else {
          reject(error);
        }
      });
    });
  }
}
