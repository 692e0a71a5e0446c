export type DiagnosticLevel = "debug" | "info" | "warn" | "error";

export type DiagnosticJSON = {
  time: string;               // ISO
  level: DiagnosticLevel;
  msg: string;
  meta?: unknown;
  stack?: string;
};

export const DIAGNOSTIC_LEVELS: Record<DiagnosticLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};
