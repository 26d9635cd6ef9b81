export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let activeLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  activeLevel = level;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

function enabled(level: LogLevel): boolean {
  return SEVERITY[level] >= SEVERITY[activeLevel];
}

// Lines read `[scope] message`, same as the admin request logger.
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, ...details) => {
      if (enabled('debug')) console.debug(prefix, message, ...details);
    },
    info: (message, ...details) => {
      if (enabled('info')) console.log(prefix, message, ...details);
    },
    warn: (message, ...details) => {
      if (enabled('warn')) console.warn(prefix, message, ...details);
    },
    error: (message, ...details) => {
      if (enabled('error')) console.error(prefix, message, ...details);
    },
  };
}
