import { formatRequireLine } from '../require_resolver';
import type {
  ResolutionFailure,
  ResolutionOutcome,
  ResolutionSuccess,
  VersionSource,
} from './batch_resolver.types';

/**
 * Resolves identifiers one after another.
 *
 * Each resolution, workspace teardown included, finishes before the next
 * begins. Per-identifier errors become failed outcomes; nothing a single
 * identifier does stops the batch.
 */
export class BatchResolver {
  constructor(private readonly source: VersionSource) {}

  async resolveAll(identifiers: readonly string[]): Promise<ResolutionOutcome[]> {
    const outcomes: ResolutionOutcome[] = [];

    for (const identifier of identifiers) {
      outcomes.push(await this.resolveOne(identifier));
    }

    return outcomes;
  }

  async resolveOne(identifier: string): Promise<ResolutionOutcome> {
    try {
      const version = await this.source.resolveVersion(identifier);
      return { ok: true, identifier, version, line: formatRequireLine(identifier, version) };
    } catch (error) {
      return {
        ok: false,
        identifier,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}

/**
 * Splits outcomes into failures and successes, both in input order
 */
export function partitionOutcomes(outcomes: readonly ResolutionOutcome[]): {
  failures: ResolutionFailure[];
  successes: ResolutionSuccess[];
} {
  const failures: ResolutionFailure[] = [];
  const successes: ResolutionSuccess[] = [];

  for (const outcome of outcomes) {
    if (outcome.ok) {
      successes.push(outcome);
    } else {
      failures.push(outcome);
    }
  }

  return { failures, successes };
}
