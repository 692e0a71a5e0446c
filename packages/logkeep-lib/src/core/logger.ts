import type { LogHandler } from "../handlers/handler";
import { PersistenceError, describeError } from "../lib/errors";
import type { LogLevel } from "../lib/types";
import { Instant } from "../models/instant";
import { LogEntry, compareLevels, parseLogLevel } from "../models/log-entry";

export interface LoggerOptions {
  minLevel?: LogLevel | string;
}

/**
 * Front door for application code. Builds one immutable entry per call and
 * hands it to every handler whose threshold it passes.
 */
export class Logger {
  private readonly handlers: readonly LogHandler[];
  private minLevel: LogLevel;

  constructor(handlers: LogHandler | LogHandler[], options: LoggerOptions = {}) {
    this.handlers = Array.isArray(handlers) ? [...handlers] : [handlers];
    this.minLevel = parseLogLevel(options.minLevel ?? "INFO");
  }

  get level(): LogLevel {
    return this.minLevel;
  }

  setLogLevel(level: LogLevel | string): void {
    this.minLevel = parseLogLevel(level);
  }

  isEnabled(level: LogLevel): boolean {
    return compareLevels(level, this.minLevel) >= 0;
  }

  /**
   * Resolves to the persisted entry, or `null` when `level` is below the
   * threshold. Rejects with `PersistenceError` if any handler failed; the
   * others still received the entry.
   */
  async log(level: LogLevel | string, message: string): Promise<LogEntry | null> {
    const resolvedLevel = parseLogLevel(level);
    if (!this.isEnabled(resolvedLevel)) {
      return null;
    }

    const entry = LogEntry.create(resolvedLevel, message, Instant.now());
    const outcomes = await Promise.allSettled(
      this.handlers.map((handler) => handler.persist(entry)),
    );

    const failures: Error[] = [];
    outcomes.forEach((outcome, index) => {
      if (outcome.status === "rejected") {
        failures.push(
          outcome.reason instanceof Error
            ? outcome.reason
            : new PersistenceError(describeError(outcome.reason), {
              path: this.handlers[index].location,
            }),
        );
      }
    });

    if (failures.length === 1 && failures[0] instanceof PersistenceError) {
      throw failures[0];
    }
    if (failures.length > 0) {
      throw new PersistenceError(
        `${failures.length} of ${this.handlers.length} handler(s) failed to persist the entry: ${failures
          .map((failure) => failure.message)
          .join("; ")}`,
        { failures, cause: failures[0] },
      );
    }

    return entry;
  }

  debug(message: string): Promise<LogEntry | null> {
    return this.log("DEBUG", message);
  }

  info(message: string): Promise<LogEntry | null> {
    return this.log("INFO", message);
  }

  warning(message: string): Promise<LogEntry | null> {
    return this.log("WARNING", message);
  }

  error(message: string): Promise<LogEntry | null> {
    return this.log("ERROR", message);
  }

  critical(message: string): Promise<LogEntry | null> {
    return this.log("CRITICAL", message);
  }
}
