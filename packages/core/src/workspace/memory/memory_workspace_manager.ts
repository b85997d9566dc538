/**
 * MemoryWorkspaceManager - in-memory WorkspaceManager for tests
 *
 * Hands out synthetic paths and tracks which workspaces are still live,
 * so tests can assert that a resolution released everything it acquired.
 *
 * @module workspace/memory
 */

import type { Workspace, WorkspaceManager } from '../workspace.types';
import { WorkspaceError } from '../errors';

export class MemoryWorkspaceManager implements WorkspaceManager {
  private counter = 0;
  private live = new Set<string>();
  private acquired: string[] = [];
  private failAcquire: Error | null = null;
  private failRelease = false;

  constructor(private readonly root: string = '/tmp/memory') {}

  async acquire(): Promise<Workspace> {
    if (this.failAcquire) {
      throw new WorkspaceError(this.root, this.failAcquire);
    }
    this.counter += 1;
    const workspacePath = `${this.root}/modreq-${this.counter}`;
    this.live.add(workspacePath);
    this.acquired.push(workspacePath);
    return { path: workspacePath };
  }

  async release(workspace: Workspace): Promise<void> {
    if (this.failRelease) {
      // Removal failures are swallowed by contract; the workspace stays live
      return;
    }
    this.live.delete(workspace.path);
  }

  // ==================== Test Helper Methods ====================

  /** Make every following acquire() fail with `error` (null to reset) */
  setAcquireFailure(error: Error | null): void {
    this.failAcquire = error;
  }

  /** Make every following release() a silent no-op */
  setReleaseFailure(fail: boolean): void {
    this.failRelease = fail;
  }

  /** Paths acquired and not yet released */
  getLiveWorkspaces(): string[] {
    return [...this.live];
  }

  /** Every path handed out, in order */
  getAcquiredWorkspaces(): string[] {
    return [...this.acquired];
  }
}
