/**
 * In-memory implementations for tests
 */

export { MemoryConfigStore } from './config_store/memory';
export { MemoryWorkspaceManager } from './workspace/memory';
export { MemoryProcessRunner, ok, fail } from './process_runner/memory';
export type { RecordedCall } from './process_runner/memory';
