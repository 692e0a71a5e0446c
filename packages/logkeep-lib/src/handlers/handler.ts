import type { MalformedRecordError } from "../lib/errors";
import type { LogLevel } from "../lib/types";
import type { Instant } from "../models/instant";
import type { LogEntry } from "../models/log-entry";

/**
 * Field filters a backend may evaluate natively. Bounds are inclusive.
 */
export interface LogQuery {
  levels?: readonly LogLevel[];
  from?: Instant;
  to?: Instant;
}

export interface ReadReport {
  entries: LogEntry[];
  malformed: MalformedRecordError[];
}

export type MalformedRecordListener = (report: {
  path: string;
  errors: MalformedRecordError[];
}) => void;

/**
 * Persists and retrieves log entries for one storage backend.
 *
 * Each call acquires its file or connection, does its work and releases it
 * before the returned promise settles, whether it succeeds or fails.
 */
export interface LogHandler {
  /** Where the backend lives, for diagnostics. */
  readonly location: string;

  /**
   * Appends exactly one record. Rejects with `PersistenceError` when the
   * backend cannot be written.
   */
  persist(entry: LogEntry): Promise<void>;

  /**
   * Every stored entry in write order. A backend that was never written to
   * yields an empty array; malformed records are skipped.
   */
  readAll(): Promise<LogEntry[]>;

  /**
   * Optional pushdown of level/time filters into the backend. Results keep
   * write order.
   */
  query?(criteria: LogQuery): Promise<LogEntry[]>;
}

export function matchesQuery(criteria: LogQuery): (entry: LogEntry) => boolean {
  const { levels, from, to } = criteria;
  return (entry) => {
    if (levels && !levels.includes(entry.level)) return false;
    if (from && entry.timestamp.compare(from) < 0) return false;
    if (to && entry.timestamp.compare(to) > 0) return false;
    return true;
  };
}
