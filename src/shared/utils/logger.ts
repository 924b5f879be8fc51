import { env } from '../../config/environment.js';

/**
 * Log levels in order of severity
 */
const LOG_LEVELS = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  magenta: '\x1b[35m',
  cyan: '\x1b[36m',
} as const;

/**
 * Color mapping for log levels
 */
const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

/**
 * Namespaced logger writing to the console.
 * Colors are only used when stdout is a terminal.
 */
export class Logger {
  private namespace: string;
  private minLevel: number;
  private useColor: boolean;

  constructor(namespace: string, level: LogLevel = env.LOG_LEVEL) {
    this.namespace = namespace;
    this.minLevel = LOG_LEVELS[level];
    this.useColor = process.stdout.isTTY === true;
  }

  private paint(color: string, text: string): string {
    return this.useColor ? `${color}${text}${COLORS.reset}` : text;
  }

  /**
   * Format a log line: timestamp, level, namespace, message
   */
  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 23);
    const levelStr = level.toUpperCase().padEnd(5);

    return [
      this.paint(COLORS.dim, timestamp),
      this.paint(LEVEL_COLORS[level], levelStr),
      this.paint(COLORS.magenta, `[${this.namespace}]`),
      message,
    ].join(' ');
  }

  isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= this.minLevel;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('debug')) {
      console.debug(this.format('debug', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('info')) {
      console.info(this.format('info', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('warn')) {
      console.warn(this.format('warn', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isLevelEnabled('error')) {
      console.error(this.format('error', message), ...args);
    }
  }
}
