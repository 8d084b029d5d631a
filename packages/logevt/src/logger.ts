export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

/** Console-backed logger that drops messages below `level`. */
export function createConsoleLogger(level: LogLevel = 'info', prefix = '[execmon]'): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(`${prefix} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled('info')) console.log(`${prefix} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(`${prefix} ${message}`, ...args);
    },
    error(message, ...args) {
      if (enabled('error')) console.error(`${prefix} ${message}`, ...args);
    },
  };
}

export const silentLogger: Logger = createConsoleLogger('silent');
