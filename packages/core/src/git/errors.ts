/**
 * Custom Error Classes for the git layer
 *
 * Typed exceptions for the resolution pipeline. Every message here is
 * user-facing: the batch report prints it next to the identifier.
 */

import { ModreqError } from '../errors';

/**
 * Base error class for all Git-related errors
 */
export class GitError extends ModreqError {
  constructor(message: string, code: string = 'GIT_ERROR') {
    super(message, code);
  }
}

/**
 * Error describing a git command that exited with a non-zero status
 */
export class GitCommandError extends GitError {
  public readonly exitCode: number;
  public readonly stderr: string;
  public readonly stdout: string;
  public readonly command: string;

  constructor(command: string, exitCode: number, stderr: string = '', stdout: string = '') {
    const reason = stderr.split('\n').map((line) => line.trim()).find(Boolean)
      ?? `exit status ${exitCode}`;
    super(`Failed to execute git command. Exit code ${exitCode}: ${reason}`, 'GIT_COMMAND_ERROR');
    this.exitCode = exitCode;
    this.stderr = stderr;
    this.stdout = stdout;
    this.command = command;
  }
}

/**
 * Error thrown when an identifier cannot be split into host and path
 */
export class InvalidIdentifierError extends GitError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super(
      `invalid repository identifier "${identifier}"; expected host/owner/name`,
      'INVALID_IDENTIFIER'
    );
    this.identifier = identifier;
  }
}

/**
 * Error thrown when every transport failed to clone the repository
 */
export class FetchError extends GitError {
  public readonly identifier: string;
  public readonly attempts: GitCommandError[];

  constructor(identifier: string, attempts: GitCommandError[]) {
    super('could not fetch via either transport; verify access to the repository', 'FETCH_ERROR');
    this.identifier = identifier;
    this.attempts = attempts;
  }
}
