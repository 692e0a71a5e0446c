import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";

import type { BackendConfig } from "../../src/handlers/create-handler";
import type { BackendKind, LogLevel } from "../../src/lib/types";
import { Instant } from "../../src/models/instant";
import { LogEntry } from "../../src/models/log-entry";

/** 2024-05-01T09:30:00.000000Z */
export const BASE_MICROS = Date.UTC(2024, 4, 1, 9, 30, 0) * 1000;

export async function makeTempDir(prefix = "logkeep-test-"): Promise<string> {
  return fs.mkdtemp(path.join(tmpdir(), prefix));
}

export function entryAt(offsetMicros: number, level: LogLevel, message: string): LogEntry {
  return LogEntry.create(level, message, Instant.fromEpochMicros(BASE_MICROS + offsetMicros));
}

export function describeEntries(entries: LogEntry[]): string[] {
  return entries.map((entry) => `${entry.level} ${entry.message}`);
}

export function backendConfig(backend: BackendKind, file: string): BackendConfig {
  switch (backend) {
    case "text":
      return { backend, path: file };
    case "jsonl":
      return { backend, path: file };
    case "csv":
      return { backend, path: file };
    case "sqlite":
      return { backend, path: file };
  }
}
