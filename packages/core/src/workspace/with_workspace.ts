import type { Workspace, WorkspaceManager } from './workspace.types';

/**
 * Runs `fn` inside a freshly acquired workspace and releases it on every
 * exit path, including a throw from `fn`.
 */
export async function withWorkspace<T>(
  manager: WorkspaceManager,
  fn: (workspace: Workspace) => Promise<T>
): Promise<T> {
  const workspace = await manager.acquire();
  try {
    return await fn(workspace);
  } finally {
    await manager.release(workspace);
  }
}
