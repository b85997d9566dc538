export { MemoryProcessRunner, ok, fail } from './memory_process_runner';
export type { RecordedCall } from './memory_process_runner';
