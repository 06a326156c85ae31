// Centralized logging service for toolbox

/**
 * Log levels in order of severity
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_NAMES: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT
};

/**
 * Map a configured level name onto a LogLevel
 */
export function toLogLevel(name: LogLevelName): LogLevel {
  return LEVEL_NAMES[name];
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prefix?: string;
  timestamps?: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: '[toolbox]',
  timestamps: false
};

/**
 * Centralized logger with structured output
 */
export class Logger {
  private config: LoggerConfig;
  private parent: Logger | null = null;
  private static instance: Logger | null = null;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * Get singleton instance
   */
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  /**
   * Reconfigure the singleton logger in place, so modules holding
   * `logger` see the change
   */
  static configure(config: Partial<LoggerConfig>): void {
    const instance = Logger.getInstance();
    instance.config = { ...instance.config, ...config };
  }

  setLevel(level: LogLevel): void {
    this.config.level = level;
  }

  getLevel(): LogLevel {
    return this.parent ? this.parent.getLevel() : this.config.level;
  }

  /**
   * A logger under another prefix whose level follows this one
   */
  child(prefix: string): Logger {
    const child = new Logger({ ...this.config, prefix });
    child.parent = this;
    return child;
  }

  /**
   * Format a log message
   */
  format(level: string, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.timestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    if (this.config.prefix) {
      parts.push(this.config.prefix);
    }

    parts.push(`[${level}]`);
    parts.push(message);

    if (context && Object.keys(context).length > 0) {
      parts.push(JSON.stringify(context));
    }

    return parts.join(' ');
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.DEBUG) {
      console.debug(this.format('DEBUG', message, context));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.INFO) {
      console.info(this.format('INFO', message, context));
    }
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.WARN) {
      console.warn(this.format('WARN', message, context));
    }
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.ERROR) {
      console.error(this.format('ERROR', message, context));
    }
  }

  /**
   * Log an error with stack trace
   */
  exception(error: Error, context?: Record<string, unknown>): void {
    if (this.getLevel() <= LogLevel.ERROR) {
      const errorContext = {
        ...context,
        name: error.name,
        stack: error.stack
      };
      console.error(this.format('ERROR', error.message, errorContext));
    }
  }
}

// Export singleton instance
export const logger = Logger.getInstance();
