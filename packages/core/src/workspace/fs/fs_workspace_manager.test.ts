/**
 * FsWorkspaceManager Tests
 *
 * Uses real directories under a per-test temporary root.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsWorkspaceManager } from './fs_workspace_manager';
import { WorkspaceError } from '../errors';
import { withWorkspace } from '../with_workspace';
import type { Logger } from '../../logger';

describe('FsWorkspaceManager', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'modreq-ws-test-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('should create a fresh empty directory with the configured prefix', async () => {
    const manager = new FsWorkspaceManager({ tempDir: root, prefix: 'ws-' });

    const workspace = await manager.acquire();

    expect(path.dirname(workspace.path)).toBe(root);
    expect(path.basename(workspace.path).startsWith('ws-')).toBe(true);
    expect(fs.readdirSync(workspace.path)).toEqual([]);
  });

  it('should fall back to the default prefix inside the temp root when the prefix is empty', async () => {
    const manager = new FsWorkspaceManager({ tempDir: root, prefix: '' });

    const workspace = await manager.acquire();

    expect(path.dirname(workspace.path)).toBe(root);
    expect(path.basename(workspace.path).startsWith('modreq-')).toBe(true);
  });

  it('should never hand out the same directory twice', async () => {
    const manager = new FsWorkspaceManager({ tempDir: root });

    const first = await manager.acquire();
    const second = await manager.acquire();

    expect(first.path).not.toBe(second.path);
  });

  it('should remove the whole tree on release', async () => {
    const manager = new FsWorkspaceManager({ tempDir: root });
    const workspace = await manager.acquire();
    fs.mkdirSync(path.join(workspace.path, 'repo', 'refs'), { recursive: true });
    fs.writeFileSync(path.join(workspace.path, 'repo', 'HEAD'), 'ref: refs/heads/main\n');

    await manager.release(workspace);

    expect(fs.existsSync(workspace.path)).toBe(false);
  });

  it('should fail with WorkspaceError when the temp root does not exist', async () => {
    const manager = new FsWorkspaceManager({ tempDir: path.join(root, 'missing', 'deeper') });

    await expect(manager.acquire()).rejects.toThrow(WorkspaceError);
  });

  it('should not throw when releasing a workspace that is already gone', async () => {
    const manager = new FsWorkspaceManager({ tempDir: root });
    const workspace = await manager.acquire();
    fs.rmSync(workspace.path, { recursive: true });

    await expect(manager.release(workspace)).resolves.toBeUndefined();
  });

  it('should log and swallow removal errors', async () => {
    const warn = jest.fn();
    const logger: Logger = { debug: jest.fn(), info: jest.fn(), warn, error: jest.fn() };
    const manager = new FsWorkspaceManager({ tempDir: root }, logger);
    const rmSpy = jest.spyOn(fs.promises, 'rm').mockRejectedValueOnce(new Error('EBUSY: resource busy'));

    try {
      await expect(manager.release({ path: path.join(root, 'held') })).resolves.toBeUndefined();
      expect(warn).toHaveBeenCalledWith(`Could not remove workspace ${path.join(root, 'held')}: EBUSY: resource busy`);
    } finally {
      rmSpy.mockRestore();
    }
  });

  describe('withWorkspace', () => {
    it('should release the workspace after the callback returns', async () => {
      const manager = new FsWorkspaceManager({ tempDir: root });
      let seen = '';

      const result = await withWorkspace(manager, async (workspace) => {
        seen = workspace.path;
        expect(fs.existsSync(workspace.path)).toBe(true);
        return 'done';
      });

      expect(result).toBe('done');
      expect(fs.existsSync(seen)).toBe(false);
    });

    it('should release the workspace when the callback throws', async () => {
      const manager = new FsWorkspaceManager({ tempDir: root });
      let seen = '';

      await expect(withWorkspace(manager, async (workspace) => {
        seen = workspace.path;
        throw new Error('clone exploded');
      })).rejects.toThrow('clone exploded');

      expect(seen).not.toBe('');
      expect(fs.existsSync(seen)).toBe(false);
    });
  });
});
