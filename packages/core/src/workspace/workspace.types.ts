/**
 * Workspace Types
 */

/**
 * An ephemeral directory owned by exactly one fetch attempt.
 */
export type Workspace = {
  /** Absolute path of the directory */
  readonly path: string;
};

/**
 * Allocates and removes workspaces.
 *
 * Implementations:
 * - FsWorkspaceManager: real temporary directories
 * - MemoryWorkspaceManager: synthetic paths for tests
 */
export interface WorkspaceManager {
  /**
   * Create a fresh, empty, uniquely named workspace
   *
   * @throws WorkspaceError if no workspace can be created
   */
  acquire(): Promise<Workspace>;

  /**
   * Remove the workspace tree. Never throws: removal is best effort.
   */
  release(workspace: Workspace): Promise<void>;
}

export type FsWorkspaceManagerOptions = {
  /** Parent directory for workspaces (default: os.tmpdir()) */
  tempDir?: string;
  /** Directory name prefix (default: "modreq-") */
  prefix?: string;
};
