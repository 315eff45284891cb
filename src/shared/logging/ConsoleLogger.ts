import type { LogLevel, Logger } from "@/shared/logging/Logger";

const LEVEL_ORDER: readonly LogLevel[] = ["debug", "info", "warn", "error"];

type Sink = (line: string) => void;

// stdout carries the recommendation list, so every level is written to stderr.
const stderrSink: Sink = (line) => {
  console.error(line);
};

export class ConsoleLogger implements Logger {
  private readonly enabledLevels: Set<LogLevel>;

  constructor(
    private readonly prefix: string = "shelf-recs",
    level: LogLevel = process.env.DEBUG === "true" ? "debug" : "warn",
    private readonly sink: Sink = stderrSink
  ) {
    this.enabledLevels = new Set(LEVEL_ORDER.slice(LEVEL_ORDER.indexOf(level)));
  }

  info(message: string): void {
    this.write("info", message);
  }

  warn(message: string): void {
    this.write("warn", message);
  }

  error(message: string, error?: unknown): void {
    if (error instanceof Error) {
      this.write("error", `${message}: ${error.message}`);
    } else if (error) {
      this.write("error", `${message}: ${String(error)}`);
    } else {
      this.write("error", message);
    }
  }

  debug(message: string): void {
    this.write("debug", message);
  }

  private write(level: LogLevel, message: string): void {
    if (!this.enabledLevels.has(level)) return;
    this.sink(`[${level.toUpperCase()}] [${this.prefix}] ${message}`);
  }
}
