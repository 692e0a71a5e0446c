import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";

import { describeError, type MalformedRecordError } from "../lib/errors";
import type { LogEntry } from "../models/log-entry";
import { FileLogHandler } from "./file-log-handler";
import type { ReadReport } from "./handler";
import { decodeStoredRecord, toStoredRecord } from "./stored-record";

export const CSV_COLUMNS = ["timestamp", "level", "message"] as const;

interface ParsedRow {
  fields: string[];
  line: number;
}

function isHeader(fields: string[]): boolean {
  return (
    fields.length === CSV_COLUMNS.length &&
    CSV_COLUMNS.every((column, index) => fields[index] === column)
  );
}

function toFields(record: unknown): string[] | null {
  if (!Array.isArray(record)) return null;
  const fields: string[] = [];
  for (const value of record) {
    if (typeof value !== "string") return null;
    fields.push(value);
  }
  return fields;
}

/** Line the parser was on when it gave up on a record. */
function skippedLine(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "lines" in error) {
    const { lines } = error;
    return typeof lines === "number" ? lines : undefined;
  }
  return undefined;
}

/**
 * RFC 4180 CSV with a `timestamp,level,message` header. Every data field is
 * quoted and embedded quotes are doubled, so commas, quotes and line breaks in
 * messages survive a round trip.
 */
export class CsvHandler extends FileLogHandler {
  protected preamble(): string {
    return stringify([[...CSV_COLUMNS]]);
  }

  protected encodeEntry(entry: LogEntry): string {
    const record = toStoredRecord(entry);
    return stringify([[record.timestamp, record.level, record.message]], { quoted: true });
  }

  protected decodeContents(contents: string): ReadReport {
    const entries: LogEntry[] = [];
    const malformed: MalformedRecordError[] = [];
    const rows: ParsedRow[] = [];

    const lastLine = () => (rows.length > 0 ? rows[rows.length - 1].line : 0);
    const unparseable = (error: unknown) =>
      this.malformed(skippedLine(error) ?? lastLine() + 1, `unparseable CSV: ${describeError(error)}`);

    try {
      parse(contents, {
        bom: true,
        relax_column_count: true,
        skip_empty_lines: true,
        skip_records_with_error: true,
        on_skip: (error: Error | undefined) => {
          malformed.push(unparseable(error ?? new Error("record skipped")));
          return undefined;
        },
        on_record: (record: unknown, context: { lines: number }) => {
          rows.push({ fields: toFields(record) ?? [], line: context.lines });
          return undefined;
        },
      });
    } catch (error) {
      // Rows parsed before the failure are kept; the rest counts as one bad record.
      malformed.push(unparseable(error));
    }

    rows.forEach(({ fields, line }, index) => {
      if (index === 0 && isHeader(fields)) return;

      if (fields.length !== CSV_COLUMNS.length) {
        malformed.push(
          this.malformed(line, `expected ${CSV_COLUMNS.length} fields, found ${fields.length}`),
        );
        return;
      }

      const [timestamp, level, message] = fields;
      const decoded = decodeStoredRecord({ timestamp, level, message });
      if ("reason" in decoded) {
        malformed.push(this.malformed(line, decoded.reason));
        return;
      }
      entries.push(decoded.entry);
    });

    // Keep the reported records in file order.
    malformed.sort((a, b) => a.record - b.record);
    return { entries, malformed };
  }
}
