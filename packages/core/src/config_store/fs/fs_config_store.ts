/**
 * FsConfigStore - Filesystem implementation of ConfigStore
 *
 * Reads modreq.config.json. Fail-safe: a missing file is simply no
 * layer, and a broken one is reported as a warning and ignored.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import type { ConfigStore } from '../config_store';
import type { ModreqConfigFile } from '../../config_manager';
import { validateConfigFile } from '../../config_manager';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';

export const CONFIG_FILE_NAME = 'modreq.config.json';
export const ENV_CONFIG_PATH = 'MODREQ_CONFIG';

export class FsConfigStore implements ConfigStore {
  readonly configPath: string;
  private readonly logger: Logger;

  constructor(configPath: string, logger: Logger = createLogger('[Config] ')) {
    this.configPath = configPath;
    this.logger = logger;
  }

  /**
   * Store for MODREQ_CONFIG when set, else modreq.config.json in `cwd`
   */
  static fromEnvironment(
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd(),
    logger?: Logger
  ): FsConfigStore {
    const explicit = env[ENV_CONFIG_PATH]?.trim();
    const configPath = explicit ? path.resolve(cwd, explicit) : path.join(cwd, CONFIG_FILE_NAME);
    return new FsConfigStore(configPath, logger);
  }

  async loadConfig(): Promise<ModreqConfigFile | null> {
    let content: string;
    try {
      content = await fs.readFile(this.configPath, 'utf-8');
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Warning: could not read ${this.configPath}: ${reason}`);
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch {
      this.logger.warn(`Warning: ${this.configPath} is not valid JSON; ignoring it.`);
      return null;
    }

    const result = validateConfigFile(data);
    if (!result.valid) {
      this.logger.warn(`Warning: ${this.configPath} ignored: ${result.errors.join(', ')}`);
      return null;
    }

    return result.config;
  }
}

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
