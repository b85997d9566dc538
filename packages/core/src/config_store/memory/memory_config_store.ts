/**
 * MemoryConfigStore - In-memory implementation of ConfigStore
 *
 * @example
 * ```typescript
 * const configStore = new MemoryConfigStore();
 * configStore.setConfig({ transports: ['https'] });
 * const manager = new ConfigManager(configStore);
 * ```
 */

import type { ConfigStore } from '../config_store';
import type { ModreqConfigFile } from '../../config_manager';

export class MemoryConfigStore implements ConfigStore {
  private config: ModreqConfigFile | null = null;

  async loadConfig(): Promise<ModreqConfigFile | null> {
    return this.config;
  }

  // ==================== Test Helper Methods ====================

  setConfig(config: ModreqConfigFile | null): void {
    this.config = config;
  }
}
