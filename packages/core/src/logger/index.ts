export { createLogger, createVerboseLogger, isLogLevel } from './logger';
export type { Logger, LogLevel } from './logger';
