import { LogReader } from "../../core/reader";
import { ALL_LEVELS, type LevelCounts, type Result } from "../../lib/types";
import { toResultError } from "../../lib/utils";
import { getConfiguredHandler } from "./configured-handler";

export async function summarizeLogs(): Promise<Result<LevelCounts>> {
  try {
    const { handler } = await getConfiguredHandler();
    const groups = await new LogReader(handler).groupByLevel();

    const counts: LevelCounts = {};
    for (const level of ALL_LEVELS) {
      const group = groups[level];
      if (group) {
        counts[level] = group.length;
      }
    }
    return { data: counts };
  } catch (error) {
    return toResultError("Failed to summarize logs", error);
  }
}
