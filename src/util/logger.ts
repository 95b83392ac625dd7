export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  NONE = 99
}

/**
 * Log categories for filtering logs
 */
export enum LogCategory {
  GENERAL = 'general',
  API = 'api'
}

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  level?: LogLevel;
  prefix?: string;
  enabledCategories?: LogCategory[];
  includeTimestamps?: boolean;
  verboseMode?: boolean;
}

/**
 * Logger interface for standardized logging across the engine
 */
export interface Logger {
  log(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void;
  debug(message: string, ...args: unknown[]): void;
  warn(message: string, context?: Record<string, unknown>): void;
  api(message: string, context?: Record<string, unknown>): void;
  setLogLevel(level: LogLevel): void;
  getLogLevel(): LogLevel;
  enableCategory(category: LogCategory): void;
  disableCategory(category: LogCategory): void;
  isCategoryEnabled(category: LogCategory): boolean;
  formatValue(value: unknown): string;
}

/**
 * Detect if running in development mode
 * @returns True if running in development mode
 */
export function isRunningInDevMode(): boolean {
  return process.env.NODE_ENV === 'development';
}

/**
 * Format a timestamp in a human-readable format
 * @returns Formatted timestamp
 */
function getFormattedTimestamp(): string {
  const now = new Date();
  return now.toISOString().replace('T', ' ').substring(0, 23);
}

/**
 * Format a value for logging based on its type
 * @param value Value to format
 * @returns Formatted string representation
 */
export function formatValue(value: unknown): string {
  if (value === null) return 'null';
  if (value === undefined) return 'undefined';

  if (typeof value === 'object') {
    if (value instanceof Error) {
      return `Error: ${value.message}${value.stack ? `\n${value.stack}` : ''}`;
    }
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      if (value.length > 10) {
        return `Array(${value.length}) [${value.slice(0, 3).map(formatValue).join(', ')}, ... ${value.length - 6} more ..., ${value.slice(-3).map(formatValue).join(', ')}]`;
      }
      return `[${value.map(formatValue).join(', ')}]`;
    }
    try {
      return JSON.stringify(value, null, 2);
    } catch (e) {
      return `[Object: circular or too complex to stringify]`;
    }
  }

  return String(value);
}

/**
 * Console-backed logger with levels, categories and prefixed lines.
 */
export class ConsoleLogger implements Logger {
  private logLevel: LogLevel;
  private logPrefix: string;
  private enabledCategories: Set<LogCategory>;
  private includeTimestamps: boolean;
  private verboseMode: boolean;

  constructor(options: LoggerConfig = {}) {
    this.logLevel = options.level ?? LogLevel.INFO;
    this.logPrefix = options.prefix ? `[${options.prefix}] ` : '';
    this.includeTimestamps = options.includeTimestamps ?? true;
    this.verboseMode = options.verboseMode ?? isRunningInDevMode();

    this.enabledCategories = new Set<LogCategory>(
      options.enabledCategories || Object.values(LogCategory)
    );
  }

  private getLogPrefix(): string {
    const timestamp = this.includeTimestamps ? `[${getFormattedTimestamp()}] ` : '';
    return timestamp + this.logPrefix;
  }

  public formatValue(value: unknown): string {
    return formatValue(value);
  }

  public setLogLevel(level: LogLevel): void {
    this.logLevel = level;
    this.info(`Log level set to ${LogLevel[level]}`);
  }

  public getLogLevel(): LogLevel {
    return this.logLevel;
  }

  public enableCategory(category: LogCategory): void {
    this.enabledCategories.add(category);
    this.debug(`Enabled log category: ${category}`);
  }

  public disableCategory(category: LogCategory): void {
    this.enabledCategories.delete(category);
    this.debug(`Disabled log category: ${category}`);
  }

  public isCategoryEnabled(category: LogCategory): boolean {
    return this.enabledCategories.has(category);
  }

  public debug(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.DEBUG && this.isCategoryEnabled(LogCategory.GENERAL) && this.verboseMode) {
      console.log(`DEBUG: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public log(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      console.log(`${this.getLogPrefix()}${message}`, ...args);
    }
  }

  public info(message: string, ...args: unknown[]): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.GENERAL)) {
      console.log(`INFO: ${this.getLogPrefix()}${message}`, ...args);
    }
  }

  /**
   * Log an API-related message
   */
  public api(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.INFO && this.isCategoryEnabled(LogCategory.API)) {
      const contextStr = context ? this.formatValue(context) : '';
      console.log(`API: ${this.getLogPrefix()}${message}${contextStr ? ' ' + contextStr : ''}`);
    }
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.WARN && this.isCategoryEnabled(LogCategory.GENERAL)) {
      if (context) {
        console.warn(`WARN: ${this.getLogPrefix()}${message}`, this.formatValue(context));
      } else {
        console.warn(`WARN: ${this.getLogPrefix()}${message}`);
      }
    }
  }

  public error(message: string, error?: Error | unknown, context?: Record<string, unknown>): void {
    if (this.logLevel <= LogLevel.ERROR && this.isCategoryEnabled(LogCategory.GENERAL)) {
      const line = `ERROR: ${this.getLogPrefix()}${message}`;
      if (error instanceof Error) {
        if (context) {
          console.error(line, error, this.formatValue(context));
        } else {
          console.error(line, error);
        }
      } else if (context) {
        console.error(line, this.formatValue(context));
      } else if (error !== undefined) {
        console.error(line, this.formatValue(error));
      } else {
        console.error(line);
      }
    }
  }
}

/**
 * Create a fallback logger that uses console when the host supplies no logger
 */
export function createFallbackLogger(prefix: string = 'HeatPumpSync'): Logger {
  let currentLogLevel = LogLevel.INFO;
  const enabledCategories = new Set<LogCategory>(Object.values(LogCategory));

  const fallbackLogger: Logger = {
    log: (message: string, ...args: unknown[]) => console.log(`[${prefix}] ${message}`, ...args),
    info: (message: string, ...args: unknown[]) => console.log(`[${prefix}] INFO: ${message}`, ...args),
    error: (message: string, error?: Error | unknown, context?: Record<string, unknown>) => {
      console.error(`[${prefix}] ERROR: ${message}`, error, context);
    },
    debug: (message: string, ...args: unknown[]) => {
      if (currentLogLevel <= LogLevel.DEBUG) {
        console.log(`[${prefix}] DEBUG: ${message}`, ...args);
      }
    },
    warn: (message: string, context?: Record<string, unknown>) => console.warn(`[${prefix}] WARN: ${message}`, context),
    api: (message: string, context?: Record<string, unknown>) => console.log(`[${prefix}] API: ${message}`, context),
    setLogLevel: (level: LogLevel) => {
      currentLogLevel = level;
      console.log(`[${prefix}] Log level set to ${LogLevel[level]}`);
    },
    getLogLevel: () => currentLogLevel,
    enableCategory: (category: LogCategory) => {
      enabledCategories.add(category);
    },
    disableCategory: (category: LogCategory) => {
      enabledCategories.delete(category);
    },
    isCategoryEnabled: (category: LogCategory) => enabledCategories.has(category),
    formatValue: (value: unknown) => formatValue(value)
  };

  return fallbackLogger;
}
