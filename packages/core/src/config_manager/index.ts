export { ConfigManager, parseTransports, ENV_GIT_BINARY, ENV_TRANSPORTS, ENV_TMPDIR } from './config_manager';
export { validateConfigFile } from './config_validator';
export { ConfigError } from './errors';
export type { IConfigManager, ModreqConfig, ModreqConfigFile } from './config_manager.types';
