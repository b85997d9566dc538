/**
 * ConfigManager Types
 */

import type { TransportScheme } from '../git';

/**
 * Contents of modreq.config.json. Every key is optional.
 */
export type ModreqConfigFile = {
  /** Git executable, a name on PATH or a path */
  gitBinary?: string;
  /** Transports tried in order */
  transports?: TransportScheme[];
  /** Parent directory for temporary workspaces */
  tempDir?: string;
  /** Name prefix of temporary workspaces */
  workspacePrefix?: string;
};

/**
 * Fully resolved configuration: defaults, then file, then environment
 */
export type ModreqConfig = {
  gitBinary: string;
  transports: TransportScheme[];
  tempDir: string;
  workspacePrefix: string;
};

export interface IConfigManager {
  loadConfig(): Promise<ModreqConfigFile | null>;
  resolveConfig(env?: NodeJS.ProcessEnv): Promise<ModreqConfig>;
}
