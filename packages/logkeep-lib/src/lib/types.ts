export type Result<T> = { data: T } | { error: string };

export const ALL_LEVELS = [
  "DEBUG",
  "INFO",
  "WARNING",
  "ERROR",
  "CRITICAL",
] as const;

export type LogLevel = (typeof ALL_LEVELS)[number];

export const LEVEL_SEVERITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARNING: 2,
  ERROR: 3,
  CRITICAL: 4,
};

export type BackendKind = "text" | "jsonl" | "csv" | "sqlite";

export const ALL_BACKENDS: BackendKind[] = ["text", "jsonl", "csv", "sqlite"];

export type LogFilter = {
  levels?: string[];
  q?: string;
  from?: string;              // ISO
  to?: string;                // ISO
  limit?: number;
  newestFirst?: boolean;
  pretty?: boolean;
};

export type LevelCounts = Partial<Record<LogLevel, number>>;
