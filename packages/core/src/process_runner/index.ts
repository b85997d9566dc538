/**
 * Process runner - external command execution
 *
 * @module process_runner
 */

export { createSpawnExecCommand } from './spawn_process_runner';
export { locateExecutable } from './locate_executable';
export { GitNotFoundError } from './errors';

export type { ExecCommand, ExecOptions, ExecResult } from './process_runner.types';
