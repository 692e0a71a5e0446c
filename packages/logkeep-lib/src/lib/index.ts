export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./utils";
export { backendLogger } from "./logger";
export type { DiagnosticJSON, DiagnosticLevel } from "./logger";
