/**
 * Tagged logger.
 *
 * Every line carries a `[Tag]` prefix so output from the transport, the
 * session loop and the adapters can be told apart in one log file.
 * The terminal front end replaces the console sink with a file sink while
 * Ink owns stdout.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogSink = (level: Exclude<LogLevel, 'silent'>, line: string, details: unknown[]) => void;

export interface Logger {
  debug: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  error: (message: string, ...details: unknown[]) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const consoleSink: LogSink = (level, line, details) => {
  console[level](line, ...details);
};

let currentLevel: LogLevel = 'info';
let currentSink: LogSink = consoleSink;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Replace where log lines go. Passing nothing restores the console.
 */
export function setLogSink(sink?: LogSink): void {
  currentSink = sink ?? consoleSink;
}

function emit(level: Exclude<LogLevel, 'silent'>, tag: string, message: string, details: unknown[]) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }
  currentSink(level, `[${tag}] ${message}`, details);
}

export function createLogger(tag: string): Logger {
  return {
    debug: (message, ...details) => emit('debug', tag, message, details),
    info: (message, ...details) => emit('info', tag, message, details),
    warn: (message, ...details) => emit('warn', tag, message, details),
    error: (message, ...details) => emit('error', tag, message, details),
  };
}
