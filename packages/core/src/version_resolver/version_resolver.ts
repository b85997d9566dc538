import type { Workspace } from '../workspace';
import type { MetadataInspector } from '../git';
import { ResolutionError } from './errors';
import { formatPseudoVersion, isUsableTag } from './pseudo_version';
import type { Logger } from '../logger';
import { createLogger } from '../logger';

/**
 * Decides which version a fetched snapshot stands for.
 *
 * A `v`-prefixed latest tag wins verbatim. Anything else (no tag, or a
 * tag without the prefix) falls back to a pseudo-version built from the
 * tip commit.
 */
export class VersionResolver {
  private readonly logger: Logger;

  constructor(
    private readonly inspector: MetadataInspector,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger('[VersionResolver] ');
  }

  /**
   * @throws ResolutionError when neither a usable tag nor the tip commit can be read
   */
  async resolve(identifier: string, workspace: Workspace): Promise<string> {
    const tag = await this.inspector.latestTag(workspace);
    if (tag.found && isUsableTag(tag.tag)) {
      return tag.tag;
    }

    if (tag.found) {
      this.logger.debug(`Ignoring tag ${tag.tag} of ${identifier}: not v-prefixed`);
    }

    const commit = await this.inspector.latestCommit(workspace);
    if (commit.found) {
      return formatPseudoVersion(commit);
    }

    throw new ResolutionError(identifier);
  }
}
