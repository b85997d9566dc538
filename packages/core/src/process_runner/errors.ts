import { ModreqError } from '../errors';

/**
 * Raised before any resolution when the git client cannot be found.
 * This is the only error that aborts a whole run.
 */
export class GitNotFoundError extends ModreqError {
  public readonly executable: string;

  constructor(executable: string) {
    super(
      executable === 'git'
        ? 'Could not find git in your PATH'
        : `Could not find ${executable} in your PATH`,
      'GIT_NOT_FOUND'
    );
    this.executable = executable;
  }
}
