/**
 * Stderr logger. stdout belongs to the MCP stdio transport, so nothing
 * here ever writes to it.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'info';
  const write = options.write ?? ((line: string) => process.stderr.write(line));

  function log(at: Exclude<LogLevel, 'silent'>, message: string) {
    if (RANK[at] < RANK[level]) return;
    write(`[${at.toUpperCase()}] [${scope}] ${message}\n`);
  }

  return {
    debug: (message) => log('debug', message),
    info: (message) => log('info', message),
    warn: (message) => log('warn', message),
    error: (message) => log('error', message),
    child: (child) => createLogger(`${scope}:${child}`, { level, write }),
  };
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
