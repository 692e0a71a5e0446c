import path from "node:path";
import { lock } from "proper-lockfile";

import { backendLogger } from "../../lib/logger";
import { makeParentDir } from "./file-service";

const queues = new Map<string, Promise<void>>();

async function withAdvisoryLock<T>(filePath: string, work: () => Promise<T>): Promise<T> {
  await makeParentDir(filePath);
  const release = await lock(filePath, {
    realpath: false,
    stale: 10_000,
    retries: { retries: 40, minTimeout: 5, maxTimeout: 100 },
  });

  try {
    return await work();
  } finally {
    await release();
  }
}

/**
 * Runs `work` while holding the lock for `filePath`.
 *
 * Calls in this process queue up per resolved path; across processes the
 * `<path>.lock` directory managed by proper-lockfile keeps writers apart.
 */
export async function withFileLock<T>(filePath: string, work: () => Promise<T>): Promise<T> {
  const key = path.resolve(filePath);
  const previous = queues.get(key) ?? Promise.resolve();

  const run = previous.then(() => withAdvisoryLock(key, work));
  const settled = run.then(
    () => undefined,
    (error: unknown) => {
      backendLogger.debug(`Locked operation on ${key} failed`, { meta: { error: String(error) } });
    },
  );
  queues.set(key, settled);

  try {
    return await run;
  } finally {
    if (queues.get(key) === settled) {
      queues.delete(key);
    }
  }
}
