/**
 * FsConfigStore Tests
 *
 * Reads real files from a temporary directory.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsConfigStore, CONFIG_FILE_NAME } from './fs_config_store';
import type { Logger } from '../../logger';

describe('FsConfigStore', () => {
  let root: string;
  let warn: jest.Mock;
  let logger: Logger;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'modreq-config-test-'));
    warn = jest.fn();
    logger = { debug: jest.fn(), info: jest.fn(), warn, error: jest.fn() };
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  const writeConfig = (content: string, name: string = CONFIG_FILE_NAME) => {
    const file = path.join(root, name);
    fs.writeFileSync(file, content);
    return file;
  };

  describe('loadConfig', () => {
    it('should return the parsed config for a valid file', async () => {
      const file = writeConfig(JSON.stringify({ transports: ['https'], gitBinary: '/opt/git' }));

      expect(await new FsConfigStore(file, logger).loadConfig()).toEqual({
        transports: ['https'],
        gitBinary: '/opt/git',
      });
      expect(warn).not.toHaveBeenCalled();
    });

    it('should return null without warning when the file does not exist', async () => {
      const store = new FsConfigStore(path.join(root, CONFIG_FILE_NAME), logger);

      expect(await store.loadConfig()).toBeNull();
      expect(warn).not.toHaveBeenCalled();
    });

    it('should warn and return null for invalid JSON', async () => {
      const file = writeConfig('{ transports: ');

      expect(await new FsConfigStore(file, logger).loadConfig()).toBeNull();
      expect(warn).toHaveBeenCalledWith(`Warning: ${file} is not valid JSON; ignoring it.`);
    });

    it('should warn and return null when the schema rejects the file', async () => {
      const file = writeConfig(JSON.stringify({ transports: ['ftp'] }));

      expect(await new FsConfigStore(file, logger).loadConfig()).toBeNull();
      expect(warn).toHaveBeenCalledWith(
        `Warning: ${file} ignored: /transports/0: must be equal to one of the allowed values`
      );
    });
  });

  describe('fromEnvironment', () => {
    it('should default to modreq.config.json in the working directory', () => {
      expect(FsConfigStore.fromEnvironment({}, root).configPath).toBe(path.join(root, CONFIG_FILE_NAME));
    });

    it('should honour MODREQ_CONFIG relative to the working directory', () => {
      const store = FsConfigStore.fromEnvironment({ MODREQ_CONFIG: 'conf/custom.json' }, root);

      expect(store.configPath).toBe(path.join(root, 'conf', 'custom.json'));
    });
  });
});
