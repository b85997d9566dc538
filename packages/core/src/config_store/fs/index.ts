export { FsConfigStore, CONFIG_FILE_NAME, ENV_CONFIG_PATH } from './fs_config_store';
