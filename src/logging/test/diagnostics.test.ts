import { describe, expect, it } from "vitest";
import { createDiagnostics, diagnosticsLevelFromEnv } from "../diagnostics.ts";
import { createEntryCollector } from "./logging_test_utils.ts";

describe("diagnosticsLevelFromEnv", () => {
  it("should stay silent unless the flag is set", () => {
    expect(diagnosticsLevelFromEnv({})).toBe("silent");
    expect(diagnosticsLevelFromEnv({ FIELDLOG_DEBUG: "" })).toBe("silent");
    expect(diagnosticsLevelFromEnv({ FIELDLOG_DEBUG: "0" })).toBe("silent");
    expect(diagnosticsLevelFromEnv({ FIELDLOG_DEBUG: "false" })).toBe("silent");
  });

  it("should turn on debug for any other value", () => {
    expect(diagnosticsLevelFromEnv({ FIELDLOG_DEBUG: "1" })).toBe("debug");
    expect(diagnosticsLevelFromEnv({ FIELDLOG_DEBUG: "yes" })).toBe("debug");
  });
});

describe("createDiagnostics", () => {
  it("should write named entries with ISO timestamps", () => {
    const collector = createEntryCollector();
    const logger = createDiagnostics({ level: "debug", destination: collector });
    logger.debug({ parsers: 2 }, "hello");

    expect(collector.entries).toHaveLength(1);
    const [entry] = collector.entries;
    expect(entry).toMatchObject({
      level: 20,
      name: "fieldlog",
      parsers: 2,
      msg: "hello",
    });
    expect(typeof entry?.time).toBe("string");
  });

  it("should take the level from the environment", () => {
    const collector = createEntryCollector();
    const logger = createDiagnostics({
      env: { FIELDLOG_DEBUG: "1" },
      destination: collector,
    });
    expect(logger.level).toBe("debug");
  });

  it("should let an explicit level override the environment", () => {
    const collector = createEntryCollector();
    const logger = createDiagnostics({
      level: "silent",
      env: { FIELDLOG_DEBUG: "1" },
      destination: collector,
    });
    logger.error("dropped");
    expect(collector.entries).toEqual([]);
  });
});
