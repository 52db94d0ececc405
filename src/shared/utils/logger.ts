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

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: COLORS.dim,
  info: COLORS.cyan,
  warn: COLORS.yellow,
  error: COLORS.red,
};

/**
 * Namespaced console logger with colored output.
 * The minimum level comes from LOG_LEVEL unless one is passed in.
 */
export class Logger {
  private readonly namespace: string;
  private readonly level: LogLevel;

  constructor(namespace: string, level: LogLevel = env.LOG_LEVEL) {
    this.namespace = namespace;
    this.level = level;
  }

  private format(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString().replace('T', ' ').substring(0, 23);
    const levelStr = level.toUpperCase().padEnd(5);

    return `${COLORS.dim}${timestamp}${COLORS.reset} ${LEVEL_COLORS[level]}${levelStr}${COLORS.reset} ${COLORS.magenta}[${this.namespace}]${COLORS.reset} ${message}`;
  }

  /**
   * Check if a log level should be output
   */
  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled('debug')) {
      console.debug(this.format('debug', message), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled('info')) {
      console.info(this.format('info', message), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled('warn')) {
      console.warn(this.format('warn', message), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled('error')) {
      console.error(this.format('error', message), ...args);
    }
  }

  /**
   * Create a child logger with a sub-namespace and the same level
   */
  child(subNamespace: string): Logger {
    return new Logger(`${this.namespace}:${subNamespace}`, this.level);
  }
}
