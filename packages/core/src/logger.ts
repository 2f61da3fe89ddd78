/**
 * Console logger shared by agents, the orchestrator and the CLI.
 * Lines look like `[Name] [LEVEL] message`; LOG_LEVEL sets the threshold.
 */

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

const envLevel = process.env.LOG_LEVEL;
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

/** Errors always print. */
export function shouldLog(level: LogLevel): boolean {
  return level === 'error' || LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function formatLogLine(name: string, level: LogLevel, message: string): string {
  return `[${name}] [${level.toUpperCase()}] ${message}`;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

export function writeLog(name: string, level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const line = formatLogLine(name, level, message);
  const args: unknown[] = data === undefined ? [line] : [line, data];

  if (level === 'error') {
    console.error(...args);
  } else if (level === 'warn') {
    console.warn(...args);
  } else {
    console.log(...args);
  }
}

export function createLogger(name: string): Logger {
  return {
    debug: (message, data) => writeLog(name, 'debug', message, data),
    info: (message, data) => writeLog(name, 'info', message, data),
    warn: (message, data) => writeLog(name, 'warn', message, data),
    error: (message, data) => writeLog(name, 'error', message, data),
  };
}
