import type { Workspace } from '../workspace';
import type { GitClient } from './git_client';
import type { FetchResult, TransportScheme } from './types';
import { buildCloneTarget } from './transport';

/** Subdirectory of the workspace that receives the bare snapshot */
export const SNAPSHOT_DIR = 'repo';

/**
 * Retrieves a shallow, bare snapshot of a remote repository.
 *
 * One call is one attempt over one transport; the fallback across
 * transports is driven by the caller so that each attempt gets its own
 * workspace.
 */
export class TransportFetcher {
  constructor(private readonly git: GitClient) {}

  /**
   * Clones `identifier` over `scheme` into `<workspace>/repo`.
   *
   * A non-zero exit status is the only failure signal. Throws only
   * InvalidIdentifierError, before git runs.
   */
  async fetch(identifier: string, workspace: Workspace, scheme: TransportScheme): Promise<FetchResult> {
    const target = buildCloneTarget(identifier, scheme);
    const args = cloneArgs(target);

    const result = await this.git.exec(args, { cwd: workspace.path });

    if (result.exitCode === 0) {
      return { ok: true, scheme, target };
    }

    return {
      ok: false,
      scheme,
      target,
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    };
  }
}

export function cloneArgs(target: string): string[] {
  return ['clone', '--depth=1', '--bare', target, SNAPSHOT_DIR];
}
