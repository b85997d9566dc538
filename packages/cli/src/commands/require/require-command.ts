import { Command } from 'commander';
import { Batch } from '@modreq/core';
import { BaseCommand } from '../../base/base-command';
import type { RequireCommandOptions, RequireJsonReport } from './require-command.types';

export const ERRORS_HEADER = 'The following errors were found:';
export const FAILED_RUN_MESSAGE = 'One or more repositories could not be processed';

/**
 * RequireCommand — prints one require line per repository.
 *
 * Errors are listed before successes; any failure makes the run exit 1.
 */
export class RequireCommand extends BaseCommand<RequireCommandOptions> {

  register(program: Command): void {
    program
      .argument('[repo-url...]', 'repositories as host/owner/name')
      .option('-v, --verbose', 'Prints out every command and result')
      .option('--json', 'Output in JSON format')
      .action(async (repositories: string[], options: RequireCommandOptions) => {
        if (repositories.length === 0) {
          program.outputHelp();
          return;
        }
        await this.executeRequire(repositories, options);
      });
  }

  async executeRequire(repositories: string[], options: RequireCommandOptions): Promise<void> {
    let batch: Batch.BatchResolver;
    try {
      const gitBinary = await this.dependencyService.locateGit();
      // Verbose lines share stdout with the report, so JSON output keeps them off
      const verbose = (options.verbose || false) && !options.json;
      batch = await this.dependencyService.getBatchResolver(gitBinary, verbose);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.handleError(message, options, error instanceof Error ? error : undefined);
      return;
    }

    const outcomes = await batch.resolveAll(repositories);
    const { failures, successes } = Batch.partitionOutcomes(outcomes);

    if (options.json) {
      const report: RequireJsonReport = {
        requires: successes.map((s) => ({ repository: s.identifier, version: s.version, line: s.line })),
        errors: failures.map((f) => ({ repository: f.identifier, error: f.error })),
      };
      this.printJson(failures.length === 0, report);
      if (failures.length > 0) {
        process.exit(1);
      }
      return;
    }

    for (const line of renderReport(outcomes)) {
      console.log(line);
    }

    if (failures.length > 0) {
      this.handleError(FAILED_RUN_MESSAGE, options);
    }
  }
}

/**
 * Text report: a blank line, the error section when anything failed,
 * then the require lines. Both sections keep input order.
 */
export function renderReport(outcomes: readonly Batch.ResolutionOutcome[]): string[] {
  const { failures, successes } = Batch.partitionOutcomes(outcomes);
  const lines: string[] = [''];

  if (failures.length > 0) {
    lines.push(ERRORS_HEADER);
    for (const failure of failures) {
      lines.push(`  ${failure.identifier}: ${failure.error}`);
    }
    lines.push('');
  }

  for (const success of successes) {
    lines.push(success.line);
  }

  return lines;
}
