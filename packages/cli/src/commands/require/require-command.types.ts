/**
 * Types for the require command.
 */

import type { BaseCommandOptions } from '../../interfaces/command';

/** Options for `modreq <repo-url...>` */
export interface RequireCommandOptions extends BaseCommandOptions {
  /** Echo every git command and its output on failure */
  verbose?: boolean;
  /** Print the report as JSON */
  json?: boolean;
}

/** JSON payload printed under --json */
export interface RequireJsonReport {
  requires: Array<{ repository: string; version: string; line: string }>;
  errors: Array<{ repository: string; error: string }>;
}
