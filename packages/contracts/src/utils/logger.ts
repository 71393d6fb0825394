/**
 * Tagged console logging.
 *
 * Lines look like `[TurnScheduler] Blocked move for Entity(idx=3, gen=0)`.
 */

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

export interface Logger {
  readonly level: LogLevel;
  error(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  debug(message: string, details?: Record<string, unknown>): void;
  child(tag: string): Logger;
}

export interface LogSink {
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  info(...args: unknown[]): void;
  debug(...args: unknown[]): void;
}

class TaggedLogger implements Logger {
  constructor(
    private readonly tag: string,
    readonly level: LogLevel,
    private readonly sink: LogSink,
  ) {}

  error(message: string, details?: Record<string, unknown>): void {
    this.write("error", message, details);
  }

  warn(message: string, details?: Record<string, unknown>): void {
    this.write("warn", message, details);
  }

  info(message: string, details?: Record<string, unknown>): void {
    this.write("info", message, details);
  }

  debug(message: string, details?: Record<string, unknown>): void {
    this.write("debug", message, details);
  }

  child(tag: string): Logger {
    return new TaggedLogger(tag, this.level, this.sink);
  }

  private write(
    level: Exclude<LogLevel, "silent">,
    message: string,
    details?: Record<string, unknown>,
  ): void {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.level]) return;
    const line = `[${this.tag}] ${message}`;
    if (details) {
      this.sink[level](line, details);
    } else {
      this.sink[level](line);
    }
  }
}

export function createLogger(
  tag: string,
  level: LogLevel = "warn",
  sink: LogSink = console,
): Logger {
  return new TaggedLogger(tag, level, sink);
}
