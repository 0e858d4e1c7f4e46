export type LogLevel = "debug" | "info" | "warn" | "error" | "none";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 4
};

export type LogFields = Record<string, unknown>;

export type LogSink = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

/**
 * Leveled console logger. Callers pass structured fields; tokens must be
 * redacted before they reach a field (see `redaction.ts`).
 */
export class Logger {
  private readonly level: LogLevel;
  private readonly context: string | undefined;
  private readonly sink: LogSink;

  constructor(options: { level?: LogLevel; context?: string; sink?: LogSink } = {}) {
    this.level = options.level ?? "info";
    this.context = options.context;
    this.sink = options.sink ?? console;
  }

  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      sink: this.sink
    });
  }

  debug(message: string, fields?: LogFields) {
    this.write("debug", message, fields);
  }

  info(message: string, fields?: LogFields) {
    this.write("info", message, fields);
  }

  warn(message: string, fields?: LogFields) {
    this.write("warn", message, fields);
  }

  error(message: string, fields?: LogFields) {
    this.write("error", message, fields);
  }

  private write(level: Exclude<LogLevel, "none">, message: string, fields?: LogFields) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const prefix = this.context
      ? `[${new Date().toISOString()}] [${level}] [${this.context}]`
      : `[${new Date().toISOString()}] [${level}]`;

    if (fields && Object.keys(fields).length > 0) {
      this.sink[level](`${prefix} ${message}`, fields);
    } else {
      this.sink[level](`${prefix} ${message}`);
    }
  }
}

export function parseLogLevel(value: string | undefined): LogLevel {
  if (value === "debug" || value === "info" || value === "warn" || value === "error" || value === "none") {
    return value;
  }
  return "info";
}

export function createSilentLogger(context?: string) {
  return new Logger({ level: "none", context });
}
