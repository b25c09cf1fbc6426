import chalk, { Chalk, type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  color?: boolean;
  // stdout belongs to the stdio transport, so logs default to stderr
  stream?: { write(chunk: string): unknown };
}

/**
 * Line-oriented logger with the same marks as the CLI helpers
 * (✓ ✗ ⚠ ℹ). Debug lines are dropped unless `debug` is set.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const paint: ChalkInstance = options.color === false ? new Chalk({ level: 0 }) : chalk;

  const marks: Record<LogLevel, string> = {
    debug: paint.gray('·'),
    info: paint.blue('ℹ'),
    warn: paint.yellow('⚠'),
    error: paint.red('✗'),
  };

  const write = (level: LogLevel, message: string) => {
    const text = level === 'debug' ? paint.gray(message) : message;
    stream.write(`${marks[level]} ${text}\n`);
  };

  return {
    debug: (message) => {
      if (options.debug) write('debug', message);
    },
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
