export * from "./lib";
export * from "./models";
export * from "./handlers";
export * from "./actions";
export { Logger, type LoggerOptions } from "./core/logger";
export { LogReader, type GroupedEntries } from "./core/reader";
