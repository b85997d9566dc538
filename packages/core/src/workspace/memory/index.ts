export { MemoryWorkspaceManager } from './memory_workspace_manager';
