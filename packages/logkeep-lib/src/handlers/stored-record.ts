import { z } from "zod";

import { ALL_LEVELS } from "../lib/types";
import { Instant } from "../models/instant";
import { LogEntry } from "../models/log-entry";

export const storedRecordSchema = z.object({
  timestamp: z.string(),
  level: z.enum(ALL_LEVELS),
  message: z.string(),
});

export type StoredRecord = z.infer<typeof storedRecordSchema>;

export function toStoredRecord(entry: LogEntry): StoredRecord {
  return {
    timestamp: entry.timestamp.toISOString(),
    level: entry.level,
    message: entry.message,
  };
}

export type DecodedRecord = { entry: LogEntry } | { reason: string };

/**
 * Validates loosely typed fields read back from storage.
 */
export function decodeStoredRecord(raw: unknown): DecodedRecord {
  const parsed = storedRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.map(String).join(".");
    return { reason: `${field ? `${field}: ` : ""}${issue?.message ?? "invalid record"}` };
  }

  const timestamp = Instant.parse(parsed.data.timestamp);
  if (!timestamp) {
    return { reason: `timestamp: not an ISO-8601 instant: "${parsed.data.timestamp}"` };
  }

  return { entry: LogEntry.create(parsed.data.level, parsed.data.message, timestamp) };
}
