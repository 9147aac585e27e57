/**
 * Console logger with level filtering.
 *
 * Everything goes to stderr: under the stdio transport stdout carries
 * JSON-RPC frames.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
  child(scope: string): Logger;
}

export function createLogger(level: LogLevel = 'info', scope?: string): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (messageLevel: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[messageLevel] < threshold) return;
    const prefix = scope ? `${scope}: ` : '';
    console.error(
      `[${new Date().toISOString()}] ${messageLevel.toUpperCase()} ${prefix}${message}`,
      ...details
    );
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
    child: (childScope) => createLogger(level, scope ? `${scope}:${childScope}` : childScope),
  };
}

/** Logger that drops everything; handy default for library code and tests */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
