/**
 * Version resolver - tag-first policy with pseudo-version fallback
 *
 * @module version_resolver
 */

export { VersionResolver } from './version_resolver';
export { PSEUDO_VERSION_BASE, formatPseudoVersion, isUsableTag } from './pseudo_version';
export { ResolutionError } from './errors';
