/**
 * RequireResolver - identifier in, require line out
 *
 * Composes the workspace manager, transport fetcher, metadata inspector
 * and version resolver. Each transport attempt runs in its own workspace,
 * released before the next attempt starts, and the workspace of the
 * successful attempt is released once the version is known.
 *
 * @module require_resolver
 */

import {
  GitClient,
  GitCommandError,
  FetchError,
  MetadataInspector,
  TransportFetcher,
  DEFAULT_TRANSPORTS,
  cloneArgs,
  parseIdentifier,
} from '../git';
import type { TransportScheme } from '../git';
import { VersionResolver } from '../version_resolver';
import { withWorkspace } from '../workspace';
import type { WorkspaceManager } from '../workspace';
import { createLogger } from '../logger';
import type { Logger } from '../logger';
import type { RequireResolverDependencies } from './require_resolver.types';

type AttemptResult =
  | { ok: true; version: string }
  | { ok: false; error: GitCommandError };

export class RequireResolver {
  private readonly git: GitClient;
  private readonly fetcher: TransportFetcher;
  private readonly versions: VersionResolver;
  private readonly workspaces: WorkspaceManager;
  private readonly transports: readonly TransportScheme[];
  private readonly logger: Logger;

  constructor(dependencies: RequireResolverDependencies) {
    this.logger = dependencies.logger ?? createLogger('verbose: ', 'silent');
    this.workspaces = dependencies.workspaces;
    this.transports = dependencies.transports && dependencies.transports.length > 0
      ? dependencies.transports
      : DEFAULT_TRANSPORTS;

    const clientDeps = {
      execCommand: dependencies.execCommand,
      logger: this.logger,
      ...(dependencies.gitBinary ? { gitBinary: dependencies.gitBinary } : {}),
    };
    this.git = new GitClient(clientDeps);
    this.fetcher = new TransportFetcher(this.git);
    this.versions = new VersionResolver(new MetadataInspector(this.git), this.logger);
  }

  /**
   * Resolves `identifier` to `require <identifier> <version>`.
   *
   * @throws InvalidIdentifierError if the identifier has no host/path split
   * @throws WorkspaceError if a workspace cannot be created
   * @throws FetchError if every transport failed
   * @throws ResolutionError if the snapshot yields no version
   */
  async resolve(identifier: string): Promise<string> {
    const version = await this.resolveVersion(identifier);
    return formatRequireLine(identifier, version);
  }

  /**
   * Same as `resolve`, returning only the version
   */
  async resolveVersion(identifier: string): Promise<string> {
    // Reject malformed identifiers before touching the filesystem
    parseIdentifier(identifier);

    const attempts: GitCommandError[] = [];

    for (const scheme of this.transports) {
      const attempt = await withWorkspace(this.workspaces, async (workspace): Promise<AttemptResult> => {
        const fetched = await this.fetcher.fetch(identifier, workspace, scheme);
        if (!fetched.ok) {
          return { ok: false, error: this.git.toError(cloneArgs(fetched.target), fetched) };
        }
        return { ok: true, version: await this.versions.resolve(identifier, workspace) };
      });

      if (attempt.ok) {
        return attempt.version;
      }
      this.logger.debug(`Error cloning repository: ${attempt.error.message}`);
      attempts.push(attempt.error);
    }

    throw new FetchError(identifier, attempts);
  }
}

export function formatRequireLine(identifier: string, version: string): string {
  return `require ${identifier} ${version}`;
}
