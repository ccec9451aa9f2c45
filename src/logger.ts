export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const prefix = options.prefix ?? '[modelsql]';
  const enabled = (level: Exclude<LogLevel, 'silent'>) => LEVEL_RANK[level] >= threshold;

  return {
    debug: (msg) => {
      if (enabled('debug')) console.debug(`${prefix} ${msg}`);
    },
    info: (msg) => {
      if (enabled('info')) console.log(`${prefix} ${msg}`);
    },
    warn: (msg) => {
      if (enabled('warn')) console.warn(`${prefix} ${msg}`);
    },
    error: (msg) => {
      if (enabled('error')) console.error(`${prefix} ${msg}`);
    },
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

export const defaultLogger: Logger = createLogger();
