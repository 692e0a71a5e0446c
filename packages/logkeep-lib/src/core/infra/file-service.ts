import fs from "fs-extra";
import path from "node:path";

import { errorCode } from "../../lib/errors";

export async function makeParentDir(filePath: string): Promise<void> {
  await fs.ensureDir(path.dirname(filePath));
}

/**
 * Size in bytes, or `null` when the file does not exist. Other stat failures
 * are rethrown.
 */
export async function fileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fs.stat(filePath);
    return stats.size;
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}

/**
 * Whole file contents, or `null` when the file does not exist.
 */
export async function readIfExists(
  filePath: string,
  encoding: BufferEncoding,
): Promise<string | null> {
  try {
    return await fs.readFile(filePath, { encoding });
  } catch (error) {
    if (errorCode(error) === "ENOENT") {
      return null;
    }
    throw error;
  }
}
