/**
 * FsWorkspaceManager - temporary directories on the local filesystem
 *
 * @module workspace/fs
 */

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { FsWorkspaceManagerOptions, Workspace, WorkspaceManager } from '../workspace.types';
import { WorkspaceError } from '../errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';

const DEFAULT_WORKSPACE_PREFIX = 'modreq-';

export class FsWorkspaceManager implements WorkspaceManager {
  private readonly tempDir: string;
  private readonly prefix: string;
  private readonly logger: Logger;

  constructor(options: FsWorkspaceManagerOptions = {}, logger: Logger = createLogger('[Workspace] ')) {
    this.tempDir = options.tempDir || os.tmpdir();
    this.prefix = options.prefix || DEFAULT_WORKSPACE_PREFIX;
    this.logger = logger;
  }

  async acquire(): Promise<Workspace> {
    try {
      const dir = await fs.mkdtemp(path.join(this.tempDir, this.prefix));
      return { path: dir };
    } catch (error) {
      throw new WorkspaceError(this.tempDir, error);
    }
  }

  async release(workspace: Workspace): Promise<void> {
    try {
      await fs.rm(workspace.path, { recursive: true, force: true });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not remove workspace ${workspace.path}: ${reason}`);
    }
  }
}
