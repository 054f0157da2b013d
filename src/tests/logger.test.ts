import { formatEntry, MemoryLogger, parseLogFormat, parseLogLevel } from "../logger";

describe("logger", () => {
  const entry = {
    ts: Date.UTC(2024, 0, 2, 3, 4, 5),
    level: "warn" as const,
    scope: "scanner.worker-0",
    message: "scan failed",
    meta: { path: "/lib/a.cbz", failures: 2 },
  };

  test("text lines carry time, level, scope and meta", () => {
    expect(formatEntry(entry, "text")).toBe(
      '2024-01-02T03:04:05.000Z WARN  [scanner.worker-0] scan failed {"path":"/lib/a.cbz","failures":2}',
    );
    expect(formatEntry({ ts: 0, level: "info", message: "up" }, "text")).toBe(
      "1970-01-01T00:00:00.000Z INFO  up",
    );
  });

  test("json lines inline the meta fields", () => {
    expect(JSON.parse(formatEntry(entry, "json"))).toEqual({
      time: "2024-01-02T03:04:05.000Z",
      level: "warn",
      scope: "scanner.worker-0",
      msg: "scan failed",
      path: "/lib/a.cbz",
      failures: 2,
    });
  });

  test("entries below the minimum level are dropped", () => {
    const logger = new MemoryLogger([], "info");
    const child = logger.child("queue");
    child.debug("noise");
    child.info("kept", {});
    expect(logger.entries).toHaveLength(1);
    expect(logger.entries[0]).toMatchObject({
      level: "info",
      scope: "queue",
      message: "kept",
      meta: undefined,
    });
    expect(child.isLevelEnabled("debug")).toBe(false);
  });

  test("level and format names are parsed leniently", () => {
    expect(parseLogLevel(" DEBUG ")).toBe("debug");
    expect(parseLogLevel("loud", "warn")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogFormat("JSON")).toBe("json");
    expect(parseLogFormat("xml")).toBe("text");
  });
});
