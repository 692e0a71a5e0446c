import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";

import { isBackendKind, type BackendConfig } from "../handlers/create-handler";
import { encodingSchema } from "../handlers/handler-config";
import { ConfigurationError } from "./errors";
import { ALL_LEVELS, type BackendKind } from "./types";

const SETTINGS_DEFINITIONS = [
  {
    key: "LOGKEEP_BACKEND",
    default: "jsonl",
  },
  {
    key: "LOGKEEP_PATH",
    default: "",
  },
  {
    key: "LOGKEEP_ENCODING",
    default: "utf8",
  },
  {
    key: "LOGKEEP_MIN_LEVEL",
    default: "INFO",
  },
  {
    key: "LOGKEEP_TABLE",
    default: "logs",
  },
] as const;

type Def = (typeof SETTINGS_DEFINITIONS)[number];

export type SettingKey = Def["key"];

const settingsSchema = z.object({
  LOGKEEP_BACKEND: z.enum(["text", "jsonl", "csv", "sqlite"]),
  LOGKEEP_PATH: z.string().min(1),
  LOGKEEP_ENCODING: encodingSchema,
  LOGKEEP_MIN_LEVEL: z.enum(ALL_LEVELS),
  LOGKEEP_TABLE: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "Table name must be a plain SQL identifier"),
});

export type Settings = z.infer<typeof settingsSchema>;

const APP_NAME = "logkeep";

const DEFAULT_LOG_FILES: Record<BackendKind, string> = {
  text: "logkeep.log",
  jsonl: "logkeep.jsonl",
  csv: "logkeep.csv",
  sqlite: "logkeep.db",
};

function getSettingsFilePath(): string {
  if (process.env.LOGKEEP_CONFIG_PATH) {
    return path.join(
      path.resolve(process.env.LOGKEEP_CONFIG_PATH),
      "settings.json",
    );
  }
  const configHome =
    process.env.XDG_CONFIG_HOME || path.join(os.homedir(), ".config");
  return path.join(configHome, APP_NAME, "settings.json");
}

async function ensureSettingsFile(): Promise<void> {
  const file = getSettingsFilePath();
  await fs.mkdir(path.dirname(file), { recursive: true });
  try {
    await fs.access(file);
  } catch {
    await fs.writeFile(file, JSON.stringify({}, null, 2), "utf-8");
  }
}

async function loadFileSettings(): Promise<Record<string, unknown>> {
  await ensureSettingsFile();
  const file = getSettingsFilePath();
  const raw = await fs.readFile(file, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`Settings file ${file} is not valid JSON`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Settings file ${file} must contain a JSON object`);
  }
  return Object.fromEntries(Object.entries(parsed));
}

function expandPath(input: string): string {
  return input.startsWith("~")
    ? path.resolve(path.join(os.homedir(), input.slice(1)))
    : input;
}

function loadEnvSettings(): Partial<Record<SettingKey, string>> {
  const envSettings: Partial<Record<SettingKey, string>> = {};

  for (const def of SETTINGS_DEFINITIONS) {
    const raw = process.env[def.key];
    if (raw !== undefined && raw !== "") {
      envSettings[def.key] = raw.trim();
    }
  }

  return envSettings;
}

function validateSettings(raw: Record<SettingKey, unknown>): Settings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    const report = parsed.error.issues
      .map((issue) => `  - ${issue.path.map(String).join(".")}: ${issue.message}`)
      .join("\n");
    const field = parsed.error.issues[0]?.path.map(String).join(".");
    throw new ConfigurationError(`logkeep settings validation failed:\n${report}`, field);
  }
  return parsed.data;
}

/**
 * Settings from `settings.json`, overridden per key by environment variables
 * of the same name, falling back to the defaults.
 */
export async function getConfig(): Promise<Settings> {
  const fileSettings = await loadFileSettings();
  const envSettings = loadEnvSettings();

  const merged: Record<string, unknown> = {};
  for (const def of SETTINGS_DEFINITIONS) {
    merged[def.key] = envSettings[def.key] ?? fileSettings[def.key] ?? def.default;
  }

  const backend = merged.LOGKEEP_BACKEND;
  if (merged.LOGKEEP_PATH === "") {
    const fileName =
      typeof backend === "string" && isBackendKind(backend)
        ? DEFAULT_LOG_FILES[backend]
        : DEFAULT_LOG_FILES.jsonl;
    merged.LOGKEEP_PATH = path.join(process.cwd(), "logs", fileName);
  }
  if (typeof merged.LOGKEEP_PATH === "string") {
    merged.LOGKEEP_PATH = expandPath(merged.LOGKEEP_PATH);
  }
  if (typeof merged.LOGKEEP_MIN_LEVEL === "string") {
    merged.LOGKEEP_MIN_LEVEL = merged.LOGKEEP_MIN_LEVEL.toUpperCase();
  }

  return validateSettings({
    LOGKEEP_BACKEND: merged.LOGKEEP_BACKEND,
    LOGKEEP_PATH: merged.LOGKEEP_PATH,
    LOGKEEP_ENCODING: merged.LOGKEEP_ENCODING,
    LOGKEEP_MIN_LEVEL: merged.LOGKEEP_MIN_LEVEL,
    LOGKEEP_TABLE: merged.LOGKEEP_TABLE,
  });
}

/**
 * Persist a single key to disk. Overwrites that key in settings.json.
 */
export async function setConfig(key: SettingKey, value: string): Promise<void> {
  const fileSettings = await loadFileSettings();
  fileSettings[key] = value;
  await fs.writeFile(
    getSettingsFilePath(),
    JSON.stringify(fileSettings, null, 2),
    "utf-8",
  );
}

export function handlerConfigFromSettings(settings: Settings): BackendConfig {
  const base = {
    path: settings.LOGKEEP_PATH,
    encoding: settings.LOGKEEP_ENCODING,
  };

  switch (settings.LOGKEEP_BACKEND) {
    case "sqlite":
      return { backend: "sqlite", ...base, table: settings.LOGKEEP_TABLE };
    case "text":
    case "jsonl":
    case "csv":
      return { backend: settings.LOGKEEP_BACKEND, ...base };
  }
}
