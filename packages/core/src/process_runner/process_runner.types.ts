/**
 * Type Definitions for the process runner
 *
 * The resolution engine never spawns processes itself: every external
 * command goes through an injected `ExecCommand`, so tests can swap in a
 * scripted fake.
 */

/**
 * Options for executing an external command
 */
export type ExecOptions = {
  /** Working directory for the command */
  cwd?: string;
  /** Environment variables merged over the current process environment */
  env?: Record<string, string>;
};

/**
 * Result of executing an external command
 */
export type ExecResult = {
  /** Exit code (0 = success, -1 = could not start or killed by a signal) */
  exitCode: number;
  /** Standard output */
  stdout: string;
  /** Standard error output */
  stderr: string;
};

/**
 * Runs `command` with `args` and resolves once it has exited.
 * Implementations never reject: failures are reported through `exitCode`.
 */
export type ExecCommand = (
  command: string,
  args: string[],
  options?: ExecOptions
) => Promise<ExecResult>;
