import { ConfigurationError } from "../lib/errors";
import type { BackendKind } from "../lib/types";
import { CsvHandler } from "./csv-handler";
import type { LogHandler } from "./handler";
import type { FileHandlerConfig, SqliteHandlerConfig } from "./handler-config";
import { JsonLinesHandler } from "./json-lines-handler";
import { SqliteHandler } from "./sqlite-handler";
import { TextFileHandler } from "./text-file-handler";

export type BackendConfig =
  | ({ backend: "text" } & FileHandlerConfig)
  | ({ backend: "jsonl" } & FileHandlerConfig)
  | ({ backend: "csv" } & FileHandlerConfig)
  | ({ backend: "sqlite" } & SqliteHandlerConfig);

export function isBackendKind(value: string): value is BackendKind {
  return value === "text" || value === "jsonl" || value === "csv" || value === "sqlite";
}

function unsupportedBackend(config: never): never {
  throw new ConfigurationError(`Unsupported backend in ${JSON.stringify(config)}`, "backend");
}

export function createHandler(config: BackendConfig): LogHandler {
  switch (config.backend) {
    case "text":
      return new TextFileHandler(config);
    case "jsonl":
      return new JsonLinesHandler(config);
    case "csv":
      return new CsvHandler(config);
    case "sqlite":
      return new SqliteHandler(config);
    default:
      return unsupportedBackend(config);
  }
}
