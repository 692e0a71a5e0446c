import { ConfigurationError } from "../lib/errors";
import { ALL_LEVELS, LEVEL_SEVERITY, type LogLevel } from "../lib/types";
import { Instant } from "./instant";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && (ALL_LEVELS as readonly string[]).includes(value);
}

/**
 * Accepts level names in any case ("warning", "Error").
 */
export function parseLogLevel(name: string): LogLevel {
  const normalized = name.trim().toUpperCase();
  if (!isLogLevel(normalized)) {
    throw new ConfigurationError(
      `Unsupported log level "${name}". Expected one of ${ALL_LEVELS.join(", ")}`,
      "level",
    );
  }
  return normalized;
}

export function compareLevels(a: LogLevel, b: LogLevel): number {
  return LEVEL_SEVERITY[a] - LEVEL_SEVERITY[b];
}

export class LogEntry {
  private constructor(
    readonly timestamp: Instant,
    readonly level: LogLevel,
    readonly message: string,
  ) {
    Object.freeze(this);
  }

  static create(
    level: LogLevel,
    message: string,
    timestamp: Instant | Date = Instant.now(),
  ): LogEntry {
    if (!isLogLevel(level)) {
      throw new ConfigurationError(`Unsupported log level "${String(level)}"`, "level");
    }
    if (typeof message !== "string") {
      throw new ConfigurationError("Log message must be a string", "message");
    }
    return new LogEntry(Instant.from(timestamp), level, message);
  }

  equals(other: LogEntry): boolean {
    return (
      this.timestamp.equals(other.timestamp) &&
      this.level === other.level &&
      this.message === other.message
    );
  }

  toString(): string {
    return `[${this.timestamp.toISOString()}] ${this.level}: ${this.message}`;
  }
}
