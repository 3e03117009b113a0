/**
 * Line logger. Writes to stderr so stdout stays free for the MCP protocol
 * and for CLI output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  debug(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerOptions {
  debug?: boolean;
  write?: (line: string) => void;
}

export const createLogger = (scope: string, options: LoggerOptions = {}): Logger => {
  const write = options.write ?? ((line: string) => process.stderr.write(line));

  const log = (level: LogLevel, message: string, meta?: Record<string, unknown>) => {
    if (level === 'debug' && !options.debug) return;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    write(`${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}${suffix}\n`);
  };

  return {
    info: (message, meta) => log('info', message, meta),
    warn: (message, meta) => log('warn', message, meta),
    error: (message, meta) => log('error', message, meta),
    debug: (message, meta) => log('debug', message, meta),
  };
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  debug: () => undefined,
};
