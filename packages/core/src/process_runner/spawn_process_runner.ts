import { spawn } from 'child_process';
import type { ExecCommand, ExecOptions, ExecResult } from './process_runner.types';

/**
 * Creates the production `ExecCommand`, backed by `child_process.spawn`.
 *
 * Output is buffered in full; the promise resolves on `close`, or on
 * `error` when the executable cannot be started at all.
 *
 * @param defaultCwd - Working directory used when a call passes none
 */
export function createSpawnExecCommand(defaultCwd: string = process.cwd()): ExecCommand {
  return (command: string, args: string[], options?: ExecOptions) => {
    return new Promise<ExecResult>((resolve) => {
      let settled = false;
      let stdout = '';
      let stderr = '';

      const finish = (exitCode: number) => {
        if (settled) return;
        settled = true;
        resolve({ exitCode, stdout, stderr });
      };

      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd,
        env: { ...process.env, ...options?.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      proc.stdout.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('error', (error: Error) => {
        stderr += error.message;
        finish(-1);
      });

      proc.on('close', (code: number | null) => {
        finish(code ?? -1);
      });
    });
  };
}
