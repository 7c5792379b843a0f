import chalk from 'chalk';
import type { LogLevel } from '../types';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

interface LevelHolder {
  level: LogLevel;
}

/**
 * Level-filtered console logger.
 *
 * Scoped loggers created with {@link Logger.scoped} share the level of the
 * logger they came from, so `--verbose` on the root turns on debug output for
 * every scope at once. Debug and warning output goes to stderr so that the
 * command's report on stdout stays clean.
 */
class Logger {
  private readonly holder: LevelHolder;
  private readonly scope: string | null;

  constructor(holder: LevelHolder = { level: 'info' }, scope: string | null = null) {
    this.holder = holder;
    this.scope = scope;
  }

  set level(level: LogLevel) {
    this.holder.level = level;
  }

  get level(): LogLevel {
    return this.holder.level;
  }

  /**
   * Logger that prefixes debug lines with `scope` and shares this logger's level
   */
  scoped(scope: string): Logger {
    return new Logger(this.holder, this.scope ? `${this.scope}:${scope}` : scope);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.holder.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      const tag = this.scope ? `[DEBUG ${this.scope}]` : '[DEBUG]';
      console.error(chalk.gray(`${tag} ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(chalk.green(`✓ ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      console.error(chalk.yellow(`⚠ ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`✗ ${message}`), ...args);
    }
  }

  log(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      console.log(message, ...args);
    }
  }
}

export type { Logger };
export const logger = new Logger();
