import * as fs from "node:fs/promises";
import path from "node:path";

import { JsonLinesHandler } from "../src/handlers/json-lines-handler";
import { backendLogger } from "../src/lib/logger";
import { describeEntries, entryAt, makeTempDir } from "./helpers/log-fixtures";

jest.mock("../src/lib/logger", () => ({
  backendLogger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    log: jest.fn(),
  },
}));

describe("JsonLinesHandler", () => {
  let file: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    file = path.join(await makeTempDir(), "app.jsonl");
  });

  it("writes one JSON object per line", async () => {
    const handler = new JsonLinesHandler({ path: file });
    await handler.persist(entryAt(0, "INFO", 'say "hi"'));
    await handler.persist(entryAt(42, "CRITICAL", "two\nlines"));

    expect(await fs.readFile(file, "utf8")).toBe(
      '{"timestamp":"2024-05-01T09:30:00.000000Z","level":"INFO","message":"say \\"hi\\""}\n' +
        '{"timestamp":"2024-05-01T09:30:00.000042Z","level":"CRITICAL","message":"two\\nlines"}\n',
    );
  });

  it("reads entries back in write order", async () => {
    const handler = new JsonLinesHandler({ path: file });
    await handler.persist(entryAt(2, "ERROR", "second written"));
    await handler.persist(entryAt(1, "DEBUG", "first timestamp"));

    const entries = await handler.readAll();
    expect(describeEntries(entries)).toEqual(["ERROR second written", "DEBUG first timestamp"]);
    expect(entries[1].timestamp.toISOString()).toBe("2024-05-01T09:30:00.000001Z");
  });

  it("skips lines that are not valid records", async () => {
    await fs.writeFile(
      file,
      [
        '{"timestamp":"2024-05-01T09:30:00.000000Z","level":"INFO","message":"good"}',
        "{not json",
        '{"timestamp":"2024-05-01T09:30:00.000000Z","level":"TRACE","message":"x"}',
        '{"timestamp":"2024-05-01T09:30:00.000000Z","level":"INFO"}',
        "   ",
        '{"timestamp":"2024-05-01T09:30:02.000000Z","level":"WARNING","message":"also good"}',
      ].join("\n"),
    );
    const handler = new JsonLinesHandler({ path: file });

    const report = await handler.read();

    expect(describeEntries(report.entries)).toEqual(["INFO good", "WARNING also good"]);
    expect(report.malformed.map((error) => error.record)).toEqual([2, 3, 4]);
    expect(report.malformed[1].reason).toMatch(/^level: /);
    expect(report.malformed[2].reason).toMatch(/^message: /);
    expect(backendLogger.warn).toHaveBeenCalledTimes(1);
  });

  it("returns nothing for a file that was never written", async () => {
    const handler = new JsonLinesHandler({ path: file });
    expect(await handler.readAll()).toEqual([]);
    await expect(fs.access(file)).rejects.toThrow();
  });
});
