import { Command } from 'commander';
import { RequireCommand } from './require-command';

/**
 * Register the require action on the root program
 */
export function registerRequireCommand(program: Command): void {
  const requireCommand = new RequireCommand();
  requireCommand.register(program);
}
