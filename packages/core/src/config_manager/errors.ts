import { ModreqError } from '../errors';

/**
 * Raised when configuration cannot be used as given
 */
export class ConfigError extends ModreqError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}
