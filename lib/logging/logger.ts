import { MutuallyExclusiveFlagsError } from "../domain/errors";

export type LogLevel = "error" | "warn" | "info" | "debug";

const SEVERITY: Record<LogLevel, number> = { error: 0, warn: 1, info: 2, debug: 3 };

export interface Logger {
  readonly level: LogLevel;
  error(message: string): void;
  warn(message: string): void;
  info(message: string): void;
  debug(message: string): void;
}

export type LogSink = Pick<Console, "error" | "warn" | "info" | "debug">;

export class ConsoleLogger implements Logger {
  constructor(
    readonly level: LogLevel = "warn",
    private readonly sink: LogSink = console,
    private readonly prefix = "[qiita-publish]",
  ) {}

  error(message: string): void {
    this.write("error", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  info(message: string): void {
    this.write("info", message);
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  private write(level: LogLevel, message: string): void {
    if (SEVERITY[level] > SEVERITY[this.level]) return;
    this.sink[level](`${this.prefix} ${level.toUpperCase()}: ${message}`);
  }
}

/**
 * quiet → error, nothing → warn, -v → info, -vv and more → debug.
 */
export function logLevelFromFlags(quiet: boolean, verbose: number): LogLevel {
  if (quiet && verbose > 0) {
    throw new MutuallyExclusiveFlagsError("--quiet", "--verbose");
  }
  if (quiet) return "error";
  if (verbose === 0) return "warn";
  if (verbose === 1) return "info";
  return "debug";
}
