/**
 * Leveled console logger shared by the client and the CLI
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * Shorthand for level 'debug'
   */
  debug?: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_TAGS: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('DEBUG'),
  info: chalk.cyan('INFO '),
  warn: chalk.yellow('WARN '),
  error: chalk.red('ERROR'),
};

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

class ConsoleLogger implements Logger {
  constructor(private level: LogLevel) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, meta?: LogMeta): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: LogMeta): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: LogMeta): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: LogMeta): void {
    this.write('error', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: LogMeta): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const line = `${chalk.gray(new Date().toISOString())} ${LEVEL_TAGS[level]} ${message}`;
    const suffix = meta && Object.keys(meta).length > 0 ? ` ${chalk.gray(JSON.stringify(meta))}` : '';

    // Keep stdout free for command output
    process.stderr.write(`${line}${suffix}\n`);
  }
}

let instance: ConsoleLogger | null = null;

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  if (options.debug) return 'debug';

  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  return fromEnv && isLogLevel(fromEnv) ? fromEnv : 'info';
}

/**
 * Configure the shared logger. Later calls change the level in place.
 */
export function initLogger(options: LoggerOptions = {}): Logger {
  const level = resolveLevel(options);
  if (instance) {
    instance.setLevel(level);
  } else {
    instance = new ConsoleLogger(level);
  }
  return instance;
}

export function getLogger(): Logger {
  return instance ?? initLogger();
}

/**
 * First eight characters of an id, for log lines
 */
export function shortId(id: string): string {
  return id.length > 8 ? `${id.slice(0, 8)}...` : id;
}
