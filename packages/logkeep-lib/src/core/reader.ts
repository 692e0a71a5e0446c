import { matchesQuery, type LogHandler, type LogQuery } from "../handlers/handler";
import type { LogLevel } from "../lib/types";
import { Instant } from "../models/instant";
import type { LogEntry } from "../models/log-entry";

export type GroupedEntries = Partial<Record<LogLevel, LogEntry[]>>;

/**
 * Read-only queries over any `LogHandler`. Nothing is cached: every call goes
 * back to the handler so entries written in between are visible.
 */
export class LogReader {
  constructor(private readonly handler: LogHandler) {}

  /**
   * Entries matching every given field filter, in write order. Pushed down
   * to the backend when it supports `query`.
   */
  async find(criteria: LogQuery): Promise<LogEntry[]> {
    if (this.handler.query) {
      return this.handler.query(criteria);
    }
    const entries = await this.handler.readAll();
    return entries.filter(matchesQuery(criteria));
  }

  findByLevel(level: LogLevel): Promise<LogEntry[]> {
    return this.find({ levels: [level] });
  }

  /**
   * Entries with `start <= timestamp <= end`. An inverted range matches
   * nothing.
   */
  async findByTimeRange(start: Instant | Date, end: Instant | Date): Promise<LogEntry[]> {
    const from = Instant.from(start);
    const to = Instant.from(end);
    if (from.compare(to) > 0) {
      return [];
    }
    return this.find({ from, to });
  }

  async groupByLevel(): Promise<GroupedEntries> {
    const groups: GroupedEntries = {};
    for (const entry of await this.handler.readAll()) {
      const group = groups[entry.level];
      if (group) {
        group.push(entry);
      } else {
        groups[entry.level] = [entry];
      }
    }
    return groups;
  }

  async findByText(
    text: string,
    options: { caseSensitive?: boolean } = {},
  ): Promise<LogEntry[]> {
    const caseSensitive = options.caseSensitive ?? false;
    const needle = caseSensitive ? text : text.toLowerCase();
    const entries = await this.handler.readAll();
    return entries.filter((entry) =>
      (caseSensitive ? entry.message : entry.message.toLowerCase()).includes(needle),
    );
  }

  async sortByDate(ascending = true): Promise<LogEntry[]> {
    const entries = await this.handler.readAll();
    const direction = ascending ? 1 : -1;
    return entries.sort((a, b) => direction * a.timestamp.compare(b.timestamp));
  }
}
