import { ModreqError } from '../errors';

/**
 * Raised when a temporary workspace cannot be created
 */
export class WorkspaceError extends ModreqError {
  public readonly tempDir: string;

  constructor(tempDir: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`could not create temporary workspace in ${tempDir}: ${reason}`, 'WORKSPACE_ERROR');
    this.tempDir = tempDir;
  }
}
