/**
 * Workspace - ephemeral directories for repository snapshots
 *
 * @module workspace
 */

export { withWorkspace } from './with_workspace';
export { WorkspaceError } from './errors';

export type { Workspace, WorkspaceManager, FsWorkspaceManagerOptions } from './workspace.types';
