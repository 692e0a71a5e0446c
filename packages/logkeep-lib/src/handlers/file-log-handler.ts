import fs from "fs-extra";

import { fileSize, readIfExists } from "../core/infra/file-service";
import { withFileLock } from "../core/infra/file-lock";
import {
  LogkeepError,
  MalformedRecordError,
  PersistenceError,
  describeError,
} from "../lib/errors";
import type { LogEntry } from "../models/log-entry";
import type { LogHandler, MalformedRecordListener, ReadReport } from "./handler";
import { reportMalformedRecords } from "./malformed-records";
import {
  fileHandlerConfigSchema,
  resolveHandlerConfig,
  type FileHandlerConfig,
} from "./handler-config";

/**
 * Shared write/read cycle for the file backends.
 *
 * `persist` appends one encoded record under the file lock and never rewrites
 * what is already there. Subclasses only decide how a record looks on disk.
 */
export abstract class FileLogHandler implements LogHandler {
  readonly path: string;
  readonly encoding: BufferEncoding;
  private readonly onMalformedRecords: MalformedRecordListener | undefined;

  constructor(config: FileHandlerConfig) {
    const resolved = resolveHandlerConfig(fileHandlerConfigSchema, config);
    this.path = resolved.path;
    this.encoding = resolved.encoding;
    this.onMalformedRecords = config.onMalformedRecords;
  }

  get location(): string {
    return this.path;
  }

  /** Serialized record, including its trailing record separator. */
  protected abstract encodeEntry(entry: LogEntry): string;

  /** Decodes the full file contents in one pass. */
  protected abstract decodeContents(contents: string): ReadReport;

  /** Written once, before the first record of an empty file. */
  protected preamble(): string {
    return "";
  }

  protected malformed(record: number, reason: string): MalformedRecordError {
    return new MalformedRecordError(this.path, record, reason);
  }

  async persist(entry: LogEntry): Promise<void> {
    try {
      await withFileLock(this.path, async () => {
        const size = await fileSize(this.path);
        const chunk = (size ? "" : this.preamble()) + this.encodeEntry(entry);
        await fs.appendFile(this.path, chunk, { encoding: this.encoding });
      });
    } catch (error) {
      if (error instanceof LogkeepError) {
        throw error;
      }
      throw new PersistenceError(
        `Failed to append log entry to ${this.path}: ${describeError(error)}`,
        { path: this.path, cause: error },
      );
    }
  }

  async read(): Promise<ReadReport> {
    let contents: string | null;
    try {
      contents = await readIfExists(this.path, this.encoding);
    } catch (error) {
      throw new PersistenceError(
        `Failed to read log file ${this.path}: ${describeError(error)}`,
        { path: this.path, cause: error },
      );
    }

    if (contents === null) {
      return { entries: [], malformed: [] };
    }

    const report = this.decodeContents(contents);
    reportMalformedRecords(this.path, report.malformed, this.onMalformedRecords);
    return report;
  }

  async readAll(): Promise<LogEntry[]> {
    const { entries } = await this.read();
    return entries;
  }
}
