/**
 * ConfigStore Interface
 *
 * Abstraction over where the optional config file lives, so the
 * ConfigManager can be tested without touching the filesystem.
 *
 * Implementations:
 * - FsConfigStore: modreq.config.json on disk
 * - MemoryConfigStore: in-memory for tests
 */

import type { ModreqConfigFile } from '../config_manager';

export interface ConfigStore {
  /**
   * Load the config file
   *
   * @returns The validated file contents, or null if absent or invalid
   */
  loadConfig(): Promise<ModreqConfigFile | null>;
}
