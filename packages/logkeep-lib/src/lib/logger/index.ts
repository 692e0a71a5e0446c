export { backendLogger } from "./server";
export * from "./types";
