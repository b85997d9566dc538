/**
 * ConfigManager - resolves the effective configuration of a run
 *
 * Three layers, later winning: built-in defaults, the optional config
 * file (through a ConfigStore), and MODREQ_* environment variables.
 *
 * @example
 * ```typescript
 * // Production usage
 * import { FsConfigStore } from '@modreq/core/fs';
 * const configManager = new ConfigManager(FsConfigStore.fromEnvironment());
 * const config = await configManager.resolveConfig();
 *
 * // Test usage
 * import { MemoryConfigStore } from '@modreq/core/memory';
 * const store = new MemoryConfigStore();
 * store.setConfig({ transports: ['https'] });
 * const config = await new ConfigManager(store).resolveConfig({});
 * ```
 */

import * as os from 'os';
import type { ConfigStore } from '../config_store/config_store';
import { DEFAULT_TRANSPORTS, isTransportScheme } from '../git';
import type { TransportScheme } from '../git';
import { ConfigError } from './errors';
import type { IConfigManager, ModreqConfig, ModreqConfigFile } from './config_manager.types';

export const ENV_GIT_BINARY = 'MODREQ_GIT';
export const ENV_TRANSPORTS = 'MODREQ_TRANSPORTS';
export const ENV_TMPDIR = 'MODREQ_TMPDIR';

export class ConfigManager implements IConfigManager {
  private readonly configStore: ConfigStore;

  constructor(configStore: ConfigStore) {
    this.configStore = configStore;
  }

  /**
   * Load the config file layer
   */
  async loadConfig(): Promise<ModreqConfigFile | null> {
    return this.configStore.loadConfig();
  }

  /**
   * Merge defaults, config file and environment
   *
   * @throws ConfigError if MODREQ_TRANSPORTS names an unknown transport
   */
  async resolveConfig(env: NodeJS.ProcessEnv = process.env): Promise<ModreqConfig> {
    const file = await this.loadConfig();

    const config: ModreqConfig = {
      gitBinary: 'git',
      transports: [...DEFAULT_TRANSPORTS],
      tempDir: os.tmpdir(),
      workspacePrefix: 'modreq-',
    };

    if (file?.gitBinary) config.gitBinary = file.gitBinary;
    if (file?.transports) config.transports = [...file.transports];
    if (file?.tempDir) config.tempDir = file.tempDir;
    if (file?.workspacePrefix) config.workspacePrefix = file.workspacePrefix;

    const envGit = env[ENV_GIT_BINARY]?.trim();
    if (envGit) config.gitBinary = envGit;

    const envTransports = env[ENV_TRANSPORTS]?.trim();
    if (envTransports) config.transports = parseTransports(envTransports);

    const envTmp = env[ENV_TMPDIR]?.trim();
    if (envTmp) config.tempDir = envTmp;

    return config;
  }
}

/**
 * Parses a comma-separated transport list such as "https,ssh"
 *
 * @throws ConfigError on unknown or duplicate schemes
 */
export function parseTransports(value: string): TransportScheme[] {
  const transports: TransportScheme[] = [];

  for (const raw of value.split(',')) {
    const scheme = raw.trim().toLowerCase();
    if (!scheme) continue;
    if (!isTransportScheme(scheme)) {
      throw new ConfigError(`${ENV_TRANSPORTS}: unknown transport "${scheme}" (expected ssh or https)`);
    }
    if (transports.includes(scheme)) {
      throw new ConfigError(`${ENV_TRANSPORTS}: transport "${scheme}" listed twice`);
    }
    transports.push(scheme);
  }

  if (transports.length === 0) {
    throw new ConfigError(`${ENV_TRANSPORTS}: no transport given`);
  }

  return transports;
}
