/**
 * Leveled logger for the engine and CLI.
 *
 * Everything goes to stderr so that generated source written to stdout
 * can be piped without log noise.
 */
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

class Logger {
  private level: LogLevel = 'info';
  private prefix: string = '';
  private readonly parent?: Logger;

  constructor(parent?: Logger) {
    this.parent = parent;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.level;
  }

  setPrefix(prefix: string): void {
    this.prefix = prefix;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.getLevel()];
  }

  private formatMessage(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }

  private write(colour: (text: string) => string, tag: string, message: string, data?: Record<string, unknown>): void {
    console.error(colour(`[${tag}] ${this.formatMessage(message)}`));
    if (data) {
      console.error(colour(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.write(chalk.gray, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.write(chalk.blue, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.write(chalk.yellow, 'WARN', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${this.formatMessage(message)}`));
    if (error instanceof Error) {
      console.error(chalk.red(this.getLevel() === 'debug' ? error.stack || error.message : error.message));
    } else if (error) {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.green(`✓ ${message}`));
  }

  fail(message: string): void {
    if (!this.shouldLog('info')) return;
    console.error(chalk.red(`✗ ${message}`));
  }

  /**
   * Create a child logger with a prefix. The child follows the
   * parent's level, including later changes to it.
   */
  child(prefix: string): Logger {
    const child = new Logger(this);
    child.prefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return child;
  }
}

export const logger = new Logger();

export { Logger };
