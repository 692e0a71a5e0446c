import { LogReader } from "../../core/reader";
import type { LogQuery } from "../../handlers/handler";
import type { LogFilter, Result } from "../../lib/types";
import { toResultError } from "../../lib/utils";
import { Instant } from "../../models/instant";
import { parseLogLevel, type LogEntry } from "../../models/log-entry";
import { getConfiguredHandler } from "./configured-handler";

function parseBound(name: "from" | "to", value: string | undefined): Result<Instant | undefined> {
  if (value === undefined || value === "") {
    return { data: undefined };
  }
  const instant = Instant.parse(value);
  if (instant) {
    return { data: instant };
  }
  const micros = Date.parse(value) * 1000;
  if (!Number.isSafeInteger(micros)) {
    return { error: `Invalid "${name}" timestamp: ${value}` };
  }
  return { data: Instant.fromEpochMicros(micros) };
}

export async function fetchLogs(filter: LogFilter = {}): Promise<Result<LogEntry[] | string>> {
  const { levels, q, limit = 500, newestFirst = false, pretty = false } = filter;

  const from = parseBound("from", filter.from);
  if ("error" in from) {
    return from;
  }
  const to = parseBound("to", filter.to);
  if ("error" in to) {
    return to;
  }

  try {
    const criteria: LogQuery = {
      levels: levels?.length ? levels.map((level) => parseLogLevel(level)) : undefined,
      from: from.data,
      to: to.data,
    };

    const { handler } = await getConfiguredHandler();
    let matches = await new LogReader(handler).find(criteria);

    if (q) {
      const needle = q.toLowerCase();
      matches = matches.filter((entry) => entry.message.toLowerCase().includes(needle));
    }

    if (newestFirst) {
      matches = matches.reverse();
    }
    matches = matches.slice(0, Math.max(0, limit));

    if (!pretty) {
      return { data: matches };
    }

    return { data: matches.map((entry) => entry.toString()).join("\n") };
  } catch (error) {
    return toResultError("Failed to fetch logs", error);
  }
}

export async function getLogReader(): Promise<Result<LogReader>> {
  try {
    const { handler } = await getConfiguredHandler();
    return { data: new LogReader(handler) };
  } catch (error) {
    return toResultError("Failed to open configured log backend", error);
  }
}
