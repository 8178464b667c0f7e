/**
 * Logging for URI dispatch.
 */

/**
 * Log levels.
 */
export enum LogLevel {
  Debug = 'debug',
  Warn = 'warn',
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.Debug, LogLevel.Warn];

/**
 * Log entry structure.
 */
export interface LogEntry {
  /** Log level. */
  level: LogLevel;
  /** Log message. */
  message: string;
  /** Timestamp. */
  timestamp: Date;
  /** Component that wrote the entry. */
  scope?: string;
  /** Additional fields. */
  fields?: Record<string, unknown>;
}

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, fields?: Record<string, unknown>): void;
  warn(message: string, fields?: Record<string, unknown>): void;
  withScope(scope: string): Logger;
}

/**
 * Console logger implementation.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly scope?: string;

  constructor(minLevel: LogLevel = LogLevel.Warn, scope?: string) {
    this.minLevel = minLevel;
    this.scope = scope;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Debug, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this.log(LogLevel.Warn, message, fields);
  }

  withScope(scope: string): Logger {
    return new ConsoleLogger(this.minLevel, scope);
  }

  /**
   * Formats an entry as a single line.
   */
  static format(entry: LogEntry): string {
    const parts: string[] = [entry.timestamp.toISOString(), `[${entry.level.toUpperCase()}]`];

    if (entry.scope) {
      parts.push(`[${entry.scope}]`);
    }

    parts.push(entry.message);

    if (entry.fields && Object.keys(entry.fields).length > 0) {
      parts.push(JSON.stringify(entry.fields));
    }

    return parts.join(' ');
  }

  private log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (LEVEL_ORDER.indexOf(level) < LEVEL_ORDER.indexOf(this.minLevel)) {
      return;
    }

    const output = ConsoleLogger.format({
      level,
      message,
      timestamp: new Date(),
      scope: this.scope,
      fields,
    });

    switch (level) {
      case LogLevel.Debug:
        console.debug(output);
        break;
      case LogLevel.Warn:
        console.warn(output);
        break;
    }
  }
}

/**
 * No-op logger that discards all logs.
 */
export class NoopLogger implements Logger {
  debug(): void {
    // No-op
  }
  warn(): void {
    // No-op
  }
  withScope(): Logger {
    return this;
  }
}

/**
 * Creates a console logger.
 */
export function createLogger(minLevel?: LogLevel): Logger {
  return new ConsoleLogger(minLevel);
}

/**
 * Creates a no-op logger.
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}
