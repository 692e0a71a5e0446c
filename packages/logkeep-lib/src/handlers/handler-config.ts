import fs from "fs-extra";
import path from "node:path";
import { z } from "zod";

import { ConfigurationError } from "../lib/errors";
import type { MalformedRecordListener } from "./handler";

/**
 * Character encodings only. Binary-to-text codecs such as `hex` and `base64`
 * would decode each record instead of encoding it.
 */
export const TEXT_ENCODINGS = [
  "utf8",
  "utf-8",
  "utf16le",
  "utf-16le",
  "ucs2",
  "ucs-2",
  "latin1",
  "ascii",
] as const satisfies readonly BufferEncoding[];

export const encodingSchema = z.enum(TEXT_ENCODINGS, {
  error: () => `Unsupported text encoding, expected one of ${TEXT_ENCODINGS.join(", ")}`,
});

export const fileHandlerConfigSchema = z.object({
  path: z.string().trim().min(1, "A backend path is required"),
  encoding: encodingSchema.optional(),
});

export const sqliteHandlerConfigSchema = fileHandlerConfigSchema.extend({
  table: z
    .string()
    .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Table name must be a plain SQL identifier")
    .optional(),
});

interface ListenerOption {
  onMalformedRecords?: MalformedRecordListener;
}

export type FileHandlerConfig = z.input<typeof fileHandlerConfigSchema> & ListenerOption;
export type SqliteHandlerConfig = z.input<typeof sqliteHandlerConfigSchema> & ListenerOption;

export interface ResolvedHandlerConfig {
  path: string;
  encoding: BufferEncoding;
}

/**
 * Validates a backend configuration and resolves its path. Throws
 * `ConfigurationError`; never creates or writes anything.
 */
export function resolveHandlerConfig<T extends { path: string; encoding?: BufferEncoding }>(
  schema: z.ZodType<T>,
  raw: unknown,
): T & ResolvedHandlerConfig {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.map(String).join(".") || undefined;
    throw new ConfigurationError(
      `Invalid handler configuration${field ? ` (${field})` : ""}: ${issue?.message ?? "unknown issue"}`,
      field,
    );
  }

  const resolvedPath = path.resolve(parsed.data.path);
  const stats = fs.statSync(resolvedPath, { throwIfNoEntry: false });
  if (stats?.isDirectory()) {
    throw new ConfigurationError(
      `Backend path ${resolvedPath} is a directory, expected a file`,
      "path",
    );
  }

  return {
    ...parsed.data,
    path: resolvedPath,
    encoding: parsed.data.encoding ?? "utf8",
  };
}
