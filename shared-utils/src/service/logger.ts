import { Logger, LogLevel } from "./types";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(value: string | undefined): LogLevel {
  switch (value?.toLowerCase()) {
    case "debug":
      return "debug";
    case "warn":
    case "warning":
      return "warn";
    case "error":
      return "error";
    default:
      return "info";
  }
}

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  private threshold: number;

  constructor(private name: string, level: LogLevel = "info") {
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.name}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.name}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.name}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.enabled("error")) {
      console.error(`[${this.name}] ${message}`, ...args);
    }
  }

  /**
   * Logger for a sub-component, e.g. `collector:scan`
   */
  child(suffix: string): ConsoleLogger {
    const child = new ConsoleLogger(`${this.name}:${suffix}`);
    child.threshold = this.threshold;
    return child;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= this.threshold;
  }
}

export function createLogger(
  name: string,
  level: string | undefined = process.env.LOG_LEVEL
): ConsoleLogger {
  return new ConsoleLogger(name, parseLogLevel(level));
}
