import { createLogger, format, transports } from "winston";
import { DIAGNOSTIC_LEVELS, type DiagnosticJSON, type DiagnosticLevel } from "./types";

function isDiagnosticLevel(value: string): value is DiagnosticLevel {
  return Object.hasOwn(DIAGNOSTIC_LEVELS, value);
}

const jsonLine = format.printf((info) => {
  const line: DiagnosticJSON = {
    time: String(info.time ?? new Date().toISOString()),
    level: isDiagnosticLevel(info.level) ? info.level : "info",
    msg: String(info.message),
    meta: info.meta,
    stack: typeof info.stack === "string" ? info.stack : undefined,
  };
  return JSON.stringify(line);
});

const consolePretty = format.printf((info) => {
  const ts = String(info.time ?? new Date().toISOString());
  const meta = info.meta ? ` ${JSON.stringify(info.meta)}` : "";
  const stack = typeof info.stack === "string" ? `\n${info.stack}` : "";
  return `${ts} ${String(info.level).toUpperCase()} [logkeep] ${String(info.message)}${meta}${stack}`;
});

type DiagnosticTransport =
  | transports.ConsoleTransportInstance
  | transports.FileTransportInstance;

function buildTransports(): DiagnosticTransport[] {
  const sinks: DiagnosticTransport[] = [
    new transports.Console({
      stderrLevels: ["error", "warn"],
      format: consolePretty,
    }),
  ];

  const diagnosticsFile = process.env.LOGKEEP_DIAGNOSTICS_FILE;
  if (diagnosticsFile) {
    sinks.push(new transports.File({ filename: diagnosticsFile, format: jsonLine }));
  }

  return sinks;
}

const configuredLevel = process.env.LOGKEEP_DIAGNOSTICS_LEVEL ?? "info";

export const backendLogger = createLogger({
  levels: DIAGNOSTIC_LEVELS,
  level: isDiagnosticLevel(configuredLevel) ? configuredLevel : "info",
  format: format.combine(
    format.errors({ stack: true }),
    format.timestamp({ alias: "time", format: () => new Date().toISOString() }),
  ),
  transports: buildTransports(),
});
