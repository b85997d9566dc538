/**
 * Result of resolving one identifier, keyed by the identifier as given
 */
export type ResolutionOutcome =
  | {
    ok: true;
    identifier: string;
    version: string;
    /** `require <identifier> <version>` */
    line: string;
  }
  | {
    ok: false;
    identifier: string;
    /** Human-readable cause, printed in the report */
    error: string;
  };

export type ResolutionSuccess = Extract<ResolutionOutcome, { ok: true }>;
export type ResolutionFailure = Extract<ResolutionOutcome, { ok: false }>;

/**
 * Anything that can turn one identifier into a version
 */
export interface VersionSource {
  resolveVersion(identifier: string): Promise<string>;
}
