export { Instant } from "./instant";
export { LogEntry, compareLevels, isLogLevel, parseLogLevel } from "./log-entry";
