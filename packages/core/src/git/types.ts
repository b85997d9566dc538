/**
 * Type Definitions for the git layer
 */

import type { ExecCommand } from '../process_runner';
import type { Logger } from '../logger';

/**
 * Protocol used to reach the remote host
 */
export type TransportScheme = 'ssh' | 'https';

/**
 * Dependencies required by GitClient
 */
export type GitClientDependencies = {
  /** Function to execute shell commands (required) */
  execCommand: ExecCommand;
  /** Git executable, a name on PATH or an absolute path (default: "git") */
  gitBinary?: string;
  /** Receives every command and failure dump at debug level */
  logger?: Logger;
};

/**
 * Host and significant path of a repository identifier
 */
export type RepositoryLocation = {
  host: string;
  /** owner/name, extra segments dropped */
  path: string;
};

/**
 * Outcome of one clone attempt
 */
export type FetchResult =
  | {
    ok: true;
    scheme: TransportScheme;
    /** Clone address handed to git */
    target: string;
  }
  | {
    ok: false;
    scheme: TransportScheme;
    target: string;
    exitCode: number;
    stdout: string;
    stderr: string;
  };

/**
 * Most recent tag reachable from the snapshot tip
 */
export type TagInfo =
  | { found: false }
  | { found: true; tag: string };

/**
 * Tip commit of the snapshot
 */
export type CommitInfo =
  | { found: false }
  | {
    found: true;
    /** Exactly 12 lowercase hex characters */
    shortHash: string;
    /** YYYYMMDDHHMMSS in UTC */
    timestamp: string;
  };
