import type { MalformedRecordError } from "../lib/errors";
import type { LogEntry } from "../models/log-entry";
import { FileLogHandler } from "./file-log-handler";
import type { ReadReport } from "./handler";
import { decodeStoredRecord } from "./stored-record";

export const FIELD_SEPARATOR = "\t";

const RESERVED_CHARS = /[%\t\r\n]/g;
const ESCAPE_SEQUENCE = /%([0-9A-Fa-f]{2})/g;
const BROKEN_ESCAPE = /%(?![0-9A-Fa-f]{2})/;

export function encodeMessage(message: string): string {
  return message.replace(
    RESERVED_CHARS,
    (char) => `%${char.charCodeAt(0).toString(16).toUpperCase().padStart(2, "0")}`,
  );
}

export function decodeMessage(field: string): string | null {
  if (BROKEN_ESCAPE.test(field)) {
    return null;
  }
  return field.replace(ESCAPE_SEQUENCE, (_, hex: string) =>
    String.fromCharCode(parseInt(hex, 16)),
  );
}

/**
 * Plain text log, one line per entry:
 *
 * ```
 * 2024-05-01T09:30:00.000250Z\tWARNING\tdisk 91%25 full
 * ```
 *
 * The message is percent-encoded for `%`, tab, CR and LF so it can never
 * break the line or field framing.
 */
export class TextFileHandler extends FileLogHandler {
  protected encodeEntry(entry: LogEntry): string {
    return [entry.timestamp.toISOString(), entry.level, encodeMessage(entry.message)].join(
      FIELD_SEPARATOR,
    ) + "\n";
  }

  protected decodeContents(contents: string): ReadReport {
    const entries: LogEntry[] = [];
    const malformed: MalformedRecordError[] = [];

    const lines = contents.split("\n");
    lines.forEach((rawLine, index) => {
      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
      if (line.trim() === "") return;

      const fields = line.split(FIELD_SEPARATOR);
      if (fields.length !== 3) {
        malformed.push(this.malformed(index + 1, `expected 3 fields, found ${fields.length}`));
        return;
      }

      const [timestamp, level, encodedMessage] = fields;
      const message = decodeMessage(encodedMessage);
      if (message === null) {
        malformed.push(this.malformed(index + 1, "message has a broken percent escape"));
        return;
      }

      const decoded = decodeStoredRecord({ timestamp, level, message });
      if ("reason" in decoded) {
        malformed.push(this.malformed(index + 1, decoded.reason));
        return;
      }
      entries.push(decoded.entry);
    });

    return { entries, malformed };
  }
}
