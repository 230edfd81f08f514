import { config, type LogLevel } from './config';

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

export interface LogEntry {
  time: string;
  level: LogLevel;
  module: string;
  msg: string;
  data?: unknown;
}

export interface Logger {
  readonly module: string;
  isEnabled(level: LogLevel): boolean;
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

// JSON.stringify drops an Error's message and keeps only its own enumerable
// fields, so rule errors are flattened with their position data intact.
function toLoggable(data: unknown): unknown {
  if (data instanceof Error) {
    return { ...data, name: data.name, message: data.message };
  }
  return data;
}

/** One JSON line per entry. */
export function formatEntry(entry: LogEntry): string {
  const { data, ...rest } = entry;
  return JSON.stringify(data === undefined ? rest : { ...rest, data: toLoggable(data) });
}

/**
 * Module logger writing JSON lines to the console. Entries below `minLevel`
 * (the configured LOG_LEVEL unless given) are dropped.
 */
export function createLogger(module: string, minLevel: LogLevel = config.logLevel): Logger {
  const isEnabled = (level: LogLevel) => LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[minLevel];

  const write = (level: LogLevel, msg: string, data?: unknown) => {
    if (!isEnabled(level)) return;
    const line = formatEntry({ time: new Date().toISOString(), level, module, msg, data });
    if (level === 'ERROR') console.error(line);
    else if (level === 'WARN') console.warn(line);
    else console.log(line);
  };

  return {
    module,
    isEnabled,
    debug: (msg, data) => write('DEBUG', msg, data),
    info: (msg, data) => write('INFO', msg, data),
    warn: (msg, data) => write('WARN', msg, data),
    error: (msg, data) => write('ERROR', msg, data),
  };
}
