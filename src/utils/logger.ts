/**
 * Logger utility that handles output correctly based on execution mode
 * - STDIO mode: All output goes to stderr (stdout carries results or JSON-RPC)
 * - CONSOLE mode: Uses console.log for info, console.error for errors
 */

export enum LogMode {
  STDIO = "stdio",
  CONSOLE = "console",
}

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogContext {
  component: string;
  operation: string;
  [key: string]: string | number | boolean | undefined;
}

const LEVEL_NAMES: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

/**
 * Map a level name ("debug", "info", ...) to a LogLevel
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_NAMES[name.trim().toLowerCase()];
}

class Logger {
  private mode: LogMode = LogMode.CONSOLE;
  private logLevel: LogLevel = LogLevel.INFO;

  /**
   * Set the logging mode
   */
  setMode(mode: LogMode): void {
    this.mode = mode;
  }

  /**
   * Set the minimum log level
   */
  setLogLevel(level: LogLevel): void {
    this.logLevel = level;
  }

  /**
   * Log an informational message
   */
  info(message: string, ...args: unknown[]): void {
    if (this.logLevel > LogLevel.INFO) {
      return;
    }

    if (this.mode === LogMode.STDIO) {
      console.error(message, ...args);
    } else {
      console.log(message, ...args);
    }
  }

  /**
   * Log an error message
   */
  error(message: string, ...args: unknown[]): void {
    if (this.logLevel > LogLevel.ERROR) {
      return;
    }
    console.error(message, ...args);
  }

  /**
   * Log a warning message
   */
  warn(message: string, ...args: unknown[]): void {
    if (this.logLevel > LogLevel.WARN) {
      return;
    }

    if (this.mode === LogMode.STDIO) {
      console.error(message, ...args);
    } else {
      console.warn(message, ...args);
    }
  }

  /**
   * Log a debug message
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.logLevel > LogLevel.DEBUG) {
      return;
    }

    if (this.mode === LogMode.STDIO) {
      console.error(`[DEBUG] ${message}`, ...args);
    } else {
      console.debug(message, ...args);
    }
  }

  /**
   * Log a caught error together with where it happened
   */
  exception(message: string, error: unknown, context: LogContext): void {
    const details =
      error instanceof Error ? `${error.name}: ${error.message}` : String(error);
    const where = Object.entries(context)
      .filter(([, value]) => value !== undefined)
      .map(([key, value]) => `${key}=${value}`)
      .join(" ");
    this.error(`${message} [${where}] ${details}`);
  }
}

// Export singleton instance
export const logger = new Logger();
