import { backendLogger } from "./logger";
import type { DiagnosticLevel } from "./logger/types";
import type { Result } from "./types";

export interface LogErrorOptions<T> {
  level?: DiagnosticLevel;
  shortMessage?: string;
  result?: Result<T>;
  error?: unknown;
  nullErrorMessage?: string;
}

export function logError<T>({
  level = "error",
  shortMessage,
  result,
  error,
  nullErrorMessage,
}: LogErrorOptions<T>): T | false {
  const log = (err: unknown, message: string) =>
    backendLogger.log(level, message, { meta: { err: String(err) } });
  const msg = shortMessage || "An error occurred";

  if (error) {
    log(error, msg);
    return false;
  }

  if (!result) {
    log(new Error(shortMessage), msg);
    return false;
  }

  if ("error" in result) {
    log(new Error(result.error), msg);
    return false;
  }

  if (nullErrorMessage && result.data === null) {
    log(new Error(nullErrorMessage), msg);
    return false;
  }

  return result.data;
}

export function toResultError(shortMessage: string, error: unknown): { error: string } {
  logError({ shortMessage, error });
  return { error: `${shortMessage}: ${error instanceof Error ? error.message : String(error)}` };
}
