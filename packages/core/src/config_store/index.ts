export type { ConfigStore } from './config_store';
