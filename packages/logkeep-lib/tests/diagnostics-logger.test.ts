import path from "node:path";

import { makeTempDir } from "./helpers/log-fixtures";

describe("backendLogger", () => {
  const previous = {
    file: process.env.LOGKEEP_DIAGNOSTICS_FILE,
    level: process.env.LOGKEEP_DIAGNOSTICS_LEVEL,
  };

  afterEach(() => {
    if (previous.file === undefined) delete process.env.LOGKEEP_DIAGNOSTICS_FILE;
    else process.env.LOGKEEP_DIAGNOSTICS_FILE = previous.file;
    if (previous.level === undefined) delete process.env.LOGKEEP_DIAGNOSTICS_LEVEL;
    else process.env.LOGKEEP_DIAGNOSTICS_LEVEL = previous.level;
  });

  async function loadFresh() {
    const holder: { server?: typeof import("../src/lib/logger/server") } = {};
    await jest.isolateModulesAsync(async () => {
      holder.server = await import("../src/lib/logger/server");
    });
    if (!holder.server) throw new Error("logger module did not load");
    return holder.server.backendLogger;
  }

  it("writes to the console at the configured level", async () => {
    delete process.env.LOGKEEP_DIAGNOSTICS_FILE;
    process.env.LOGKEEP_DIAGNOSTICS_LEVEL = "debug";

    const logger = await loadFresh();

    expect(logger.level).toBe("debug");
    expect(logger.transports.map((transport) => transport.constructor.name)).toEqual(["Console"]);
  });

  it("falls back to info for an unknown level", async () => {
    process.env.LOGKEEP_DIAGNOSTICS_LEVEL = "chatty";
    expect((await loadFresh()).level).toBe("info");
  });

  it("adds a JSON file sink when a diagnostics file is set", async () => {
    process.env.LOGKEEP_DIAGNOSTICS_FILE = path.join(await makeTempDir(), "diagnostics.jsonl");

    const logger = await loadFresh();

    expect(logger.transports.map((transport) => transport.constructor.name)).toEqual([
      "Console",
      "File",
    ]);
    logger.close();
  });
});
