export * from "./handler";
export * from "./handler-config";
export { FileLogHandler } from "./file-log-handler";
export { TextFileHandler, encodeMessage, decodeMessage } from "./text-file-handler";
export { JsonLinesHandler } from "./json-lines-handler";
export { CsvHandler, CSV_COLUMNS } from "./csv-handler";
export { SqliteHandler, DEFAULT_TABLE } from "./sqlite-handler";
export { createHandler, isBackendKind, type BackendConfig } from "./create-handler";
