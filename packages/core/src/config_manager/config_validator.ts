import Ajv from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import configSchema from './modreq_config.schema.json';
import type { ModreqConfigFile } from './config_manager.types';

let validator: ValidateFunction<ModreqConfigFile> | null = null;

function getValidator(): ValidateFunction<ModreqConfigFile> {
  if (!validator) {
    const ajv = new Ajv({ allErrors: true });
    validator = ajv.compile<ModreqConfigFile>(configSchema);
  }
  return validator;
}

function formatError(error: ErrorObject): string {
  const field = error.instancePath || '/';
  return `${field}: ${error.message ?? 'is invalid'}`;
}

/**
 * Validates parsed JSON against modreq_config.schema.json
 *
 * @returns The typed config, or the list of violations
 */
export function validateConfigFile(
  data: unknown
): { valid: true; config: ModreqConfigFile } | { valid: false; errors: string[] } {
  const validate = getValidator();
  if (validate(data)) {
    return { valid: true, config: data };
  }
  return { valid: false, errors: (validate.errors ?? []).map(formatError) };
}
