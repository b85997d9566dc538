/**
 * Git - clone and inspect remote repositories through the git client
 *
 * @module git
 */

export { GitClient } from './git_client';
export { TransportFetcher, SNAPSHOT_DIR, cloneArgs } from './transport_fetcher';
export { MetadataInspector, COMMIT_DATE_FORMAT, SHORT_HASH_LENGTH, snapshotPath } from './metadata_inspector';
export {
  DEFAULT_TRANSPORTS,
  TRANSPORT_SCHEMES,
  buildCloneTarget,
  isTransportScheme,
  parseIdentifier,
} from './transport';

export type {
  GitClientDependencies,
  TransportScheme,
  RepositoryLocation,
  FetchResult,
  TagInfo,
  CommitInfo,
} from './types';

export {
  GitError,
  GitCommandError,
  InvalidIdentifierError,
  FetchError,
} from './errors';
