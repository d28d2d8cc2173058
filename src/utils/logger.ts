import color from 'picocolors';
import type { LogLevel } from '../types/index.js';

const LOG_LEVELS: Record<LogLevel, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface LoggerOptions {
  showTimestamp?: boolean;
  showLevel?: boolean;
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

class SimpleLogger {
  private level: LogLevel = 'info';
  private isCLI: boolean;

  constructor() {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (envLevel && isLogLevel(envLevel)) {
      this.level = envLevel;
    }
    // Scheduled runs (cron, CI) are not TTYs and get timestamped lines
    this.isCLI = process.env.NODE_ENV !== 'test' && Boolean(process.stdout.isTTY);
  }

  setLevel(level: string): void {
    const normalizedLevel = level.toLowerCase();
    if (isLogLevel(normalizedLevel)) {
      this.level = normalizedLevel;
    }
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] <= LOG_LEVELS[this.level];
  }

  private formatMessage(level: LogLevel, message: string, options?: LoggerOptions): string {
    const showTimestamp = options?.showTimestamp ?? !this.isCLI;
    const showLevel = options?.showLevel ?? !this.isCLI;

    let formatted = '';

    if (showTimestamp) {
      const timestamp = new Date().toISOString().replace('T', ' ').slice(0, -5);
      formatted += `${timestamp} `;
    }

    if (showLevel) {
      formatted += `[${level}]: `;
    }

    return formatted + message;
  }

  private withMeta(message: string, meta?: Record<string, unknown>): string {
    return meta ? `${message} ${JSON.stringify(meta)}` : message;
  }

  success(message: string): void {
    if (this.shouldLog('info')) {
      console.log(color.green(this.isCLI ? `✓ ${message}` : this.formatMessage('info', message)));
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      const fullMessage = this.withMeta(message, meta);
      console.log(
        this.isCLI
          ? color.cyan(`ℹ ${fullMessage}`)
          : color.blue(this.formatMessage('info', fullMessage)),
      );
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      const fullMessage = this.withMeta(message, meta);
      console.warn(
        color.yellow(this.isCLI ? `⚠ ${fullMessage}` : this.formatMessage('warn', fullMessage)),
      );
    }
  }

  error(message: string, error?: unknown): void {
    if (!this.shouldLog('error')) {
      return;
    }

    let fullMessage = message;
    if (error instanceof Error) {
      fullMessage += `: ${error.message}`;
      if (this.level === 'debug' && error.stack) {
        fullMessage += `\n${error.stack}`;
      }
    } else if (error !== undefined) {
      fullMessage += ` ${JSON.stringify(error)}`;
    }

    console.error(
      color.red(this.isCLI ? `✖ ${fullMessage}` : this.formatMessage('error', fullMessage)),
    );
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(
        color.gray(
          this.formatMessage('debug', this.withMeta(message, meta), {
            showTimestamp: true,
            showLevel: true,
          }),
        ),
      );
    }
  }

  dim(message: string): void {
    if (this.isCLI) {
      console.log(color.dim(message));
    } else {
      this.info(message);
    }
  }

  plain(message: string): void {
    console.log(message);
  }

  emptyLine(): void {
    console.log();
  }
}

export const logger = new SimpleLogger();
