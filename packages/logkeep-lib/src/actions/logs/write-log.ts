import { Logger } from "../../core/logger";
import type { Result } from "../../lib/types";
import { toResultError } from "../../lib/utils";
import type { LogEntry } from "../../models/log-entry";
import { getConfiguredHandler } from "./configured-handler";

/**
 * Logs one message through the configured backend. `data` is `null` when the
 * level is below `LOGKEEP_MIN_LEVEL`.
 */
export async function writeLog(
  level: string,
  message: string,
): Promise<Result<LogEntry | null>> {
  try {
    const { handler, settings } = await getConfiguredHandler();
    const logger = new Logger(handler, { minLevel: settings.LOGKEEP_MIN_LEVEL });
    return { data: await logger.log(level, message) };
  } catch (error) {
    return toResultError("Failed to write log entry", error);
  }
}
