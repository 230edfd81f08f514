export * from './dsl';
export * from './signals';
export * from './backtest';
export * from './data';
export * from './nl';
export { RuleEngineError, LexError, ParseError, EvaluationError, DataError } from './errors';
export { createLogger, loadConfig } from './utils';
export type { AppConfig, LogLevel, Logger } from './utils';
