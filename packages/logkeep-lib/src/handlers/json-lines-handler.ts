import type { MalformedRecordError } from "../lib/errors";
import type { LogEntry } from "../models/log-entry";
import { FileLogHandler } from "./file-log-handler";
import type { ReadReport } from "./handler";
import { decodeStoredRecord, toStoredRecord } from "./stored-record";

/**
 * JSON Lines: one `{"timestamp","level","message"}` object per line.
 */
export class JsonLinesHandler extends FileLogHandler {
  protected encodeEntry(entry: LogEntry): string {
    return JSON.stringify(toStoredRecord(entry)) + "\n";
  }

  protected decodeContents(contents: string): ReadReport {
    const entries: LogEntry[] = [];
    const malformed: MalformedRecordError[] = [];

    contents.split("\n").forEach((line, index) => {
      const trimmed = line.trim();
      if (!trimmed) return;

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch (error) {
        malformed.push(
          this.malformed(index + 1, error instanceof SyntaxError ? error.message : "invalid JSON"),
        );
        return;
      }

      const decoded = decodeStoredRecord(raw);
      if ("reason" in decoded) {
        malformed.push(this.malformed(index + 1, decoded.reason));
        return;
      }
      entries.push(decoded.entry);
    });

    return { entries, malformed };
  }
}
