export { writeLog } from "./write-log";
export { fetchLogs, getLogReader } from "./fetch-logs";
export { summarizeLogs } from "./summarize-logs";
