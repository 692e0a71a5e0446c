import * as fs from "node:fs/promises";
import path from "node:path";

import { CsvHandler } from "../src/handlers/csv-handler";
import { createHandler, isBackendKind } from "../src/handlers/create-handler";
import {
  TEXT_ENCODINGS,
  fileHandlerConfigSchema,
  resolveHandlerConfig,
} from "../src/handlers/handler-config";
import { JsonLinesHandler } from "../src/handlers/json-lines-handler";
import { SqliteHandler } from "../src/handlers/sqlite-handler";
import { TextFileHandler } from "../src/handlers/text-file-handler";
import { ConfigurationError } from "../src/lib/errors";
import { makeTempDir } from "./helpers/log-fixtures";

jest.mock("../src/lib/logger", () => ({
  backendLogger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    log: jest.fn(),
  },
}));

function captureError(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("createHandler", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it("builds the handler for each backend", () => {
    expect(createHandler({ backend: "text", path: path.join(dir, "a.log") })).toBeInstanceOf(
      TextFileHandler,
    );
    expect(createHandler({ backend: "jsonl", path: path.join(dir, "a.jsonl") })).toBeInstanceOf(
      JsonLinesHandler,
    );
    expect(createHandler({ backend: "csv", path: path.join(dir, "a.csv") })).toBeInstanceOf(
      CsvHandler,
    );
    expect(
      createHandler({ backend: "sqlite", path: path.join(dir, "a.db"), table: "events" }),
    ).toBeInstanceOf(SqliteHandler);
  });

  it("resolves relative paths and defaults the encoding", () => {
    const handler = new TextFileHandler({ path: "logs/relative.log" });
    expect(handler.path).toBe(path.resolve("logs/relative.log"));
    expect(handler.encoding).toBe("utf8");
  });

  it("does not touch the filesystem when constructed", async () => {
    createHandler({ backend: "csv", path: path.join(dir, "nested", "a.csv") });
    await expect(fs.access(path.join(dir, "nested"))).rejects.toThrow();
  });

  it("rejects a blank path", () => {
    const error = captureError(() => createHandler({ backend: "jsonl", path: "   " }));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: "path" });
  });

  it("rejects a directory path", () => {
    const error = captureError(() => createHandler({ backend: "text", path: dir }));
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({
      field: "path",
      message: `Backend path ${dir} is a directory, expected a file`,
    });
  });

  it("rejects an unknown encoding", () => {
    const error = captureError(() =>
      resolveHandlerConfig(fileHandlerConfigSchema, {
        path: path.join(dir, "a.csv"),
        encoding: "klingon",
      }),
    );
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: "encoding" });
  });
});

describe("handler encodings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it.each(["hex", "base64", "base64url", "binary"])("rejects the %s codec", (encoding) => {
    const error = captureError(() =>
      resolveHandlerConfig(fileHandlerConfigSchema, { path: path.join(dir, "a.jsonl"), encoding }),
    );
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: "encoding" });
  });

  it.each(TEXT_ENCODINGS)("accepts the %s text encoding", (encoding) => {
    const handler = new JsonLinesHandler({ path: path.join(dir, "a.jsonl"), encoding });
    expect(handler.encoding).toBe(encoding);
  });
});

describe("isBackendKind", () => {
  it("accepts only known backends", () => {
    expect(["text", "jsonl", "csv", "sqlite"].every(isBackendKind)).toBe(true);
    expect(isBackendKind("xml")).toBe(false);
    expect(isBackendKind("JSONL")).toBe(false);
  });
});
