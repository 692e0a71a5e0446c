import * as fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  getConfig,
  handlerConfigFromSettings,
  setConfig,
} from "../src/lib/config";
import { ConfigurationError } from "../src/lib/errors";
import { makeTempDir } from "./helpers/log-fixtures";

const MANAGED_ENV = [
  "LOGKEEP_BACKEND",
  "LOGKEEP_PATH",
  "LOGKEEP_ENCODING",
  "LOGKEEP_MIN_LEVEL",
  "LOGKEEP_TABLE",
] as const;

async function captureError(run: () => Promise<unknown>): Promise<unknown> {
  try {
    await run();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("config", () => {
  let configDir: string;

  beforeEach(async () => {
    for (const key of MANAGED_ENV) {
      delete process.env[key];
    }
    configDir = await makeTempDir("logkeep-config-");
    process.env.LOGKEEP_CONFIG_PATH = configDir;
  });

  afterAll(() => {
    for (const key of MANAGED_ENV) {
      delete process.env[key];
    }
  });

  it("falls back to defaults and creates an empty settings file", async () => {
    const settings = await getConfig();

    expect(settings).toEqual({
      LOGKEEP_BACKEND: "jsonl",
      LOGKEEP_PATH: path.join(process.cwd(), "logs", "logkeep.jsonl"),
      LOGKEEP_ENCODING: "utf8",
      LOGKEEP_MIN_LEVEL: "INFO",
      LOGKEEP_TABLE: "logs",
    });
    expect(await fs.readFile(path.join(configDir, "settings.json"), "utf-8")).toBe("{}");
  });

  it("reads values stored with setConfig", async () => {
    await setConfig("LOGKEEP_BACKEND", "csv");
    await setConfig("LOGKEEP_MIN_LEVEL", "warning");

    const settings = await getConfig();
    expect(settings.LOGKEEP_BACKEND).toBe("csv");
    expect(settings.LOGKEEP_PATH).toBe(path.join(process.cwd(), "logs", "logkeep.csv"));
    expect(settings.LOGKEEP_MIN_LEVEL).toBe("WARNING");

    const stored: unknown = JSON.parse(
      await fs.readFile(path.join(configDir, "settings.json"), "utf-8"),
    );
    expect(stored).toEqual({ LOGKEEP_BACKEND: "csv", LOGKEEP_MIN_LEVEL: "warning" });
  });

  it("lets environment variables override the settings file", async () => {
    await setConfig("LOGKEEP_BACKEND", "csv");
    process.env.LOGKEEP_BACKEND = " sqlite ";
    process.env.LOGKEEP_TABLE = "audit";

    const settings = await getConfig();
    expect(settings.LOGKEEP_BACKEND).toBe("sqlite");
    expect(settings.LOGKEEP_PATH).toBe(path.join(process.cwd(), "logs", "logkeep.db"));
    expect(handlerConfigFromSettings(settings)).toEqual({
      backend: "sqlite",
      path: settings.LOGKEEP_PATH,
      encoding: "utf8",
      table: "audit",
    });
  });

  it("ignores empty environment variables", async () => {
    process.env.LOGKEEP_BACKEND = "";
    expect((await getConfig()).LOGKEEP_BACKEND).toBe("jsonl");
  });

  it("expands a leading tilde in the path", async () => {
    process.env.LOGKEEP_PATH = "~/logs/app.log";
    process.env.LOGKEEP_BACKEND = "text";

    const settings = await getConfig();
    expect(settings.LOGKEEP_PATH).toBe(path.join(os.homedir(), "logs", "app.log"));
    expect(handlerConfigFromSettings(settings)).toEqual({
      backend: "text",
      path: settings.LOGKEEP_PATH,
      encoding: "utf8",
    });
  });

  it("names the offending setting", async () => {
    process.env.LOGKEEP_BACKEND = "xml";

    const error = await captureError(getConfig);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: "LOGKEEP_BACKEND" });
  });

  it.each([
    ["LOGKEEP_ENCODING", "klingon"],
    ["LOGKEEP_ENCODING", "hex"],
    ["LOGKEEP_MIN_LEVEL", "loud"],
    ["LOGKEEP_TABLE", "logs; DROP TABLE logs"],
  ] as const)("rejects an invalid %s", async (key, value) => {
    process.env[key] = value;

    const error = await captureError(getConfig);
    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toMatchObject({ field: key });
  });

  it("rejects a settings file that is not JSON", async () => {
    const file = path.join(configDir, "settings.json");
    await fs.writeFile(file, "{ backend: csv");

    await expect(getConfig()).rejects.toThrow(`Settings file ${file} is not valid JSON`);
  });

  it("rejects a settings file that is not an object", async () => {
    const file = path.join(configDir, "settings.json");
    await fs.writeFile(file, "[]");

    await expect(getConfig()).rejects.toThrow(`Settings file ${file} must contain a JSON object`);
  });
});
