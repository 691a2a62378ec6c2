/**
 * Leveled console logger shared by every Livestr component.
 * Output lines look like `[timestamp][service][LEVEL] message args`.
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export type LogLevelName = "debug" | "info" | "warn" | "error";

const LEVEL_NAMES = new Map<string, LogLevel>([
  ["debug", LogLevel.DEBUG],
  ["info", LogLevel.INFO],
  ["warn", LogLevel.WARN],
  ["error", LogLevel.ERROR],
] satisfies Array<[LogLevelName, LogLevel]>);

export interface LoggerOptions {
  level?: LogLevel;
  service?: string;
  timestamp?: boolean;
}

/**
 * Map a level name (case-insensitive) to a LogLevel.
 * Unknown or empty names return undefined.
 */
export function parseLogLevel(name: string | undefined): LogLevel | undefined {
  if (!name) return undefined;
  return LEVEL_NAMES.get(name.trim().toLowerCase());
}

export class Logger {
  private level: LogLevel;
  private readonly service: string;
  private readonly timestamp: boolean;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.INFO;
    this.service = options.service ?? "Livestr";
    this.timestamp = options.timestamp ?? true;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.level;
  }

  /**
   * Build the printed line. Exposed for tests and for callers that
   * forward log lines somewhere other than the console.
   */
  format(level: string, message: string, ...args: unknown[]): string {
    const timestamp = this.timestamp ? `[${new Date().toISOString()}]` : "";
    const service = this.service ? `[${this.service}]` : "";
    const base = `${timestamp}${service}[${level}] ${message}`;

    if (args.length === 0) return base;
    return `${base} ${args.map((arg) => this.serializeArg(arg)).join(" ")}`;
  }

  private serializeArg(arg: unknown): string {
    if (arg instanceof Error) {
      const errorObj: Record<string, unknown> = {
        name: arg.name,
        message: arg.message,
      };
      if ("code" in arg && arg.code !== undefined) errorObj.code = arg.code;
      if (this.level === LogLevel.DEBUG) errorObj.stack = arg.stack;
      if (arg.cause) errorObj.cause = this.serializeArg(arg.cause);
      return JSON.stringify(errorObj);
    }

    if (typeof arg === "object" && arg !== null) {
      try {
        return JSON.stringify(arg);
      } catch {
        // circular structures
        return String(arg);
      }
    }

    return String(arg);
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.DEBUG)) {
      console.debug(this.format("DEBUG", message, ...args));
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.INFO)) {
      console.log(this.format("INFO", message, ...args));
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.WARN)) {
      console.warn(this.format("WARN", message, ...args));
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.isEnabled(LogLevel.ERROR)) {
      console.error(this.format("ERROR", message, ...args));
    }
  }

  // Child loggers share level and timestamp settings
  child(service: string): Logger {
    return new Logger({
      level: this.level,
      service: `${this.service}:${service}`,
      timestamp: this.timestamp,
    });
  }

  /**
   * Level comes from LOG_LEVEL when set, otherwise INFO in production
   * and DEBUG everywhere else.
   */
  static create(service?: string): Logger {
    const fallback =
      process.env.NODE_ENV === "production" ? LogLevel.INFO : LogLevel.DEBUG;
    const level = parseLogLevel(process.env.LOG_LEVEL) ?? fallback;
    return new Logger({ level, service });
  }
}

export const logger = Logger.create();
