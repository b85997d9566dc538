import * as path from 'path';
import type { Workspace } from '../workspace';
import type { GitClient } from './git_client';
import type { CommitInfo, TagInfo } from './types';
import { SNAPSHOT_DIR } from './transport_fetcher';

/** Compact commit date, rendered in whatever TZ the git process runs in */
export const COMMIT_DATE_FORMAT = '--date=format-local:%Y%m%d%H%M%S';

export const SHORT_HASH_LENGTH = 12;

const TIMESTAMP_PATTERN = /^\d{14}$/;
const HASH_PATTERN = /^[0-9a-f]+$/;

/**
 * Reads tag and commit metadata from a fetched snapshot.
 *
 * Both queries are best effort: failures come back as `found: false`,
 * with the details only in the diagnostics log.
 */
export class MetadataInspector {
  constructor(private readonly git: GitClient) {}

  /**
   * Nearest tag reachable from the tip, lightweight or annotated
   */
  async latestTag(workspace: Workspace): Promise<TagInfo> {
    const result = await this.git.exec(
      ['describe', '--tags', '--abbrev=0'],
      { cwd: snapshotPath(workspace) }
    );

    const tag = result.stdout.trim();
    if (result.exitCode !== 0 || !tag) {
      return { found: false };
    }

    return { found: true, tag };
  }

  /**
   * Tip commit timestamp (UTC, YYYYMMDDHHMMSS) and 12-char short hash.
   * Both queries must succeed for the commit to count as found.
   */
  async latestCommit(workspace: Workspace): Promise<CommitInfo> {
    const cwd = snapshotPath(workspace);

    const dateResult = await this.git.exec(
      ['log', '-1', COMMIT_DATE_FORMAT, '--format=%cd'],
      { cwd, env: { TZ: 'UTC' } }
    );
    if (dateResult.exitCode !== 0) {
      return { found: false };
    }

    const timestamp = dateResult.stdout.trim();
    if (!TIMESTAMP_PATTERN.test(timestamp)) {
      return { found: false };
    }

    const hashResult = await this.git.exec(
      ['rev-parse', `--short=${SHORT_HASH_LENGTH}`, 'HEAD'],
      { cwd }
    );
    if (hashResult.exitCode !== 0) {
      return { found: false };
    }

    // --short is a minimum; git lengthens it when the prefix is ambiguous
    const shortHash = hashResult.stdout.trim().toLowerCase().slice(0, SHORT_HASH_LENGTH);
    if (shortHash.length !== SHORT_HASH_LENGTH || !HASH_PATTERN.test(shortHash)) {
      return { found: false };
    }

    return { found: true, shortHash, timestamp };
  }
}

export function snapshotPath(workspace: Workspace): string {
  return path.join(workspace.path, SNAPSHOT_DIR);
}
