import Database from "better-sqlite3";
import { z } from "zod";

import { fileSize, makeParentDir } from "../core/infra/file-service";
import {
  MalformedRecordError,
  PersistenceError,
  describeError,
} from "../lib/errors";
import { ALL_LEVELS } from "../lib/types";
import { Instant } from "../models/instant";
import { LogEntry } from "../models/log-entry";
import type { LogHandler, LogQuery, MalformedRecordListener, ReadReport } from "./handler";
import {
  resolveHandlerConfig,
  sqliteHandlerConfigSchema,
  type SqliteHandlerConfig,
} from "./handler-config";
import { reportMalformedRecords } from "./malformed-records";

export const DEFAULT_TABLE = "logs";

const BUSY_TIMEOUT_MS = 5_000;

const rowSchema = z.object({
  id: z.number().int(),
  timestamp: z.number().int(),
  level: z.enum(ALL_LEVELS),
  message: z.string(),
});

type Connection = Database.Database;

/** Malformed rows are reported by their `id`. */
function rowId(raw: unknown): number | undefined {
  if (typeof raw === "object" && raw !== null && "id" in raw) {
    const { id } = raw;
    return typeof id === "number" ? id : undefined;
  }
  return undefined;
}

/**
 * SQLite backend. Timestamps are stored as integer epoch microseconds so
 * range filters compare numbers and use the `timestamp` index.
 *
 * Every statement is prepared with bound parameters; the only identifier
 * spliced into SQL is the table name, which must match
 * `[A-Za-z_][A-Za-z0-9_]*`.
 */
export class SqliteHandler implements LogHandler {
  readonly path: string;
  readonly table: string;
  private readonly onMalformedRecords: MalformedRecordListener | undefined;

  constructor(config: SqliteHandlerConfig) {
    const resolved = resolveHandlerConfig(sqliteHandlerConfigSchema, config);
    this.path = resolved.path;
    this.table = resolved.table ?? DEFAULT_TABLE;
    this.onMalformedRecords = config.onMalformedRecords;
  }

  get location(): string {
    return `${this.path}#${this.table}`;
  }

  private withConnection<T>(
    options: { readonly: boolean },
    work: (db: Connection) => T,
  ): T {
    const db = new Database(this.path, {
      readonly: options.readonly,
      fileMustExist: options.readonly,
    });
    try {
      db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
      return work(db);
    } finally {
      db.close();
    }
  }

  private ensureSchema(db: Connection): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS "${this.table}" (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp INTEGER NOT NULL,
        level TEXT NOT NULL,
        message TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS "${this.table}_timestamp_idx" ON "${this.table}" (timestamp);
      CREATE INDEX IF NOT EXISTS "${this.table}_level_idx" ON "${this.table}" (level);
    `);
  }

  private tableExists(db: Connection): boolean {
    const row = db
      .prepare("SELECT 1 AS present FROM sqlite_master WHERE type = 'table' AND name = ?")
      .get(this.table);
    return row !== undefined;
  }

  async persist(entry: LogEntry): Promise<void> {
    try {
      await makeParentDir(this.path);
      this.withConnection({ readonly: false }, (db) => {
        this.ensureSchema(db);
        const insert = db.prepare(
          `INSERT INTO "${this.table}" (timestamp, level, message) VALUES (?, ?, ?)`,
        );
        db.transaction(() => {
          insert.run(entry.timestamp.epochMicros, entry.level, entry.message);
        })();
      });
    } catch (error) {
      throw new PersistenceError(
        `Failed to insert log entry into ${this.location}: ${describeError(error)}`,
        { path: this.path, cause: error },
      );
    }
  }

  async read(criteria: LogQuery = {}): Promise<ReadReport> {
    let rows: unknown[];
    try {
      if ((await fileSize(this.path)) === null) {
        return { entries: [], malformed: [] };
      }

      rows = this.withConnection({ readonly: true }, (db) => {
        if (!this.tableExists(db)) {
          return [];
        }
        const { sql, params } = this.buildSelect(criteria);
        return db.prepare(sql).all(...params);
      });
    } catch (error) {
      throw new PersistenceError(
        `Failed to read log entries from ${this.location}: ${describeError(error)}`,
        { path: this.path, cause: error },
      );
    }

    const entries: LogEntry[] = [];
    const malformed: MalformedRecordError[] = [];
    rows.forEach((raw, index) => {
      const row = rowSchema.safeParse(raw);
      if (!row.success) {
        const issue = row.error.issues[0];
        malformed.push(
          new MalformedRecordError(
            this.location,
            rowId(raw) ?? index + 1,
            `${issue?.path.map(String).join(".") || "row"}: ${issue?.message ?? "invalid row"}`,
          ),
        );
        return;
      }
      if (!Number.isSafeInteger(row.data.timestamp)) {
        malformed.push(new MalformedRecordError(this.location, row.data.id, "timestamp out of range"));
        return;
      }
      entries.push(
        LogEntry.create(
          row.data.level,
          row.data.message,
          Instant.fromEpochMicros(row.data.timestamp),
        ),
      );
    });

    reportMalformedRecords(this.location, malformed, this.onMalformedRecords);
    return { entries, malformed };
  }

  async readAll(): Promise<LogEntry[]> {
    const { entries } = await this.read();
    return entries;
  }

  async query(criteria: LogQuery): Promise<LogEntry[]> {
    const { entries } = await this.read(criteria);
    return entries;
  }

  private buildSelect(criteria: LogQuery): { sql: string; params: Array<string | number> } {
    const clauses: string[] = [];
    const params: Array<string | number> = [];

    if (criteria.levels) {
      if (criteria.levels.length === 0) {
        clauses.push("0");
      } else {
        clauses.push(`level IN (${criteria.levels.map(() => "?").join(", ")})`);
        params.push(...criteria.levels);
      }
    }
    if (criteria.from) {
      clauses.push("timestamp >= ?");
      params.push(criteria.from.epochMicros);
    }
    if (criteria.to) {
      clauses.push("timestamp <= ?");
      params.push(criteria.to.epochMicros);
    }

    const where = clauses.length > 0 ? ` WHERE ${clauses.join(" AND ")}` : "";
    return {
      sql: `SELECT id, timestamp, level, message FROM "${this.table}"${where} ORDER BY id`,
      params,
    };
  }
}
