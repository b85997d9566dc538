export { FsWorkspaceManager } from './fs_workspace_manager';
