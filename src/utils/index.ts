export { config, loadConfig } from './config';
export type { AppConfig, LogLevel } from './config';
export { createLogger, formatEntry } from './logger';
export type { Logger, LogEntry } from './logger';
