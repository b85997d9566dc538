/**
 * Filesystem- and process-dependent implementations
 *
 * Use @modreq/core/memory for in-memory alternatives in tests.
 */

// ConfigStore
export { FsConfigStore, CONFIG_FILE_NAME, ENV_CONFIG_PATH } from './config_store/fs';

// WorkspaceManager (temporary directories)
export { FsWorkspaceManager } from './workspace/fs';

// ExecCommand backed by child_process.spawn
export { createSpawnExecCommand } from './process_runner/spawn_process_runner';
export { locateExecutable } from './process_runner/locate_executable';
