import { ModreqError } from '../errors';

/**
 * Raised when a fetched snapshot yields neither a usable tag nor commit
 * metadata. Terminal for that identifier.
 */
export class ResolutionError extends ModreqError {
  public readonly identifier: string;

  constructor(identifier: string) {
    super('failed obtaining information from cloned repository', 'RESOLUTION_ERROR');
    this.identifier = identifier;
  }
}
