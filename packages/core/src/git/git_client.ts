/**
 * GitClient - thin wrapper over the git executable
 *
 * Every git invocation of the engine goes through `exec`, which echoes the
 * command and, on failure, the captured output to the diagnostics logger.
 *
 * @module git_client
 */

import type { ExecOptions, ExecResult, ExecCommand } from '../process_runner';
import type { GitClientDependencies } from './types';
import { GitCommandError } from './errors';
import { createLogger } from '../logger';
import type { Logger } from '../logger';

const FAILURE_INDENT = '        ';

export class GitClient {
  private readonly execCommand: ExecCommand;
  private readonly gitBinary: string;
  private readonly logger: Logger;

  /**
   * @throws Error if execCommand is not provided
   */
  constructor(dependencies: GitClientDependencies) {
    if (!dependencies.execCommand) {
      throw new Error('execCommand is required for GitClient');
    }

    this.execCommand = dependencies.execCommand;
    this.gitBinary = dependencies.gitBinary || 'git';
    this.logger = dependencies.logger ?? createLogger('[GitClient] ');
  }

  /**
   * Runs git with `args`. Never throws; callers inspect `exitCode`.
   *
   * @example
   * const result = await git.exec(['describe', '--tags', '--abbrev=0'], { cwd });
   * if (result.exitCode === 0) { ... }
   */
  async exec(args: string[], options?: ExecOptions): Promise<ExecResult> {
    this.logger.debug(`Executing ${this.describe(args)}`);

    const result = await this.execCommand(this.gitBinary, args, options);

    if (result.exitCode !== 0) {
      const lines = [
        ...result.stdout.split('\n'),
        ...result.stderr.split('\n'),
      ].map((line) => FAILURE_INDENT + line);
      this.logger.debug(`Error executing:\n${lines.join('\n')}`);
    }

    return result;
  }

  /**
   * Builds the typed error for a failed result of `exec(args)`
   */
  toError(args: string[], result: ExecResult): GitCommandError {
    return new GitCommandError(this.describe(args), result.exitCode, result.stderr, result.stdout);
  }

  private describe(args: string[]): string {
    return [this.gitBinary, ...args].join(' ');
  }
}
