/** Base of every pseudo-version: no release has been tagged yet */
export const PSEUDO_VERSION_BASE = 'v0.0.0';

/**
 * A tag is usable as a version only when it carries the `v` prefix.
 * Nothing else is checked: `v-nightly` passes, `1.2.3` does not.
 */
export function isUsableTag(tag: string): boolean {
  return tag.startsWith('v');
}

/**
 * `v0.0.0-<timestamp>-<shortHash>`
 *
 * @example
 * formatPseudoVersion({ timestamp: '20240102030405', shortHash: '0123456789ab' });
 * // => "v0.0.0-20240102030405-0123456789ab"
 */
export function formatPseudoVersion(commit: { timestamp: string; shortHash: string }): string {
  return `${PSEUDO_VERSION_BASE}-${commit.timestamp}-${commit.shortHash}`;
}
