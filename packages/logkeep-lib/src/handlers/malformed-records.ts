import type { MalformedRecordError } from "../lib/errors";
import { backendLogger } from "../lib/logger";
import type { MalformedRecordListener } from "./handler";

/**
 * Warning channel for records skipped during a read: one diagnostics line,
 * plus the handler's own listener when one was configured.
 */
export function reportMalformedRecords(
  location: string,
  errors: MalformedRecordError[],
  listener: MalformedRecordListener | undefined,
): void {
  if (errors.length === 0) {
    return;
  }
  backendLogger.warn(`Skipped ${errors.length} malformed record(s) in ${location}`, {
    meta: { records: errors.map((error) => error.record) },
  });
  listener?.({ path: location, errors });
}
