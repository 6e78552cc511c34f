import {
  StructuredLogger,
  formatEntry,
  parseLogLevel,
  type LogEntry,
} from "../logger";

describe("StructuredLogger", () => {
  test("drops entries below the minimum level and scopes children", () => {
    const entries: LogEntry[] = [];
    const logger = new StructuredLogger({
      sink: (e) => entries.push(e),
      minLevel: "warn",
      clock: () => 42,
    });

    logger.info("hidden");
    logger.child("walk").child("api").warn("slow", { ms: 1200 });
    logger.error("bad", {});

    expect(entries).toEqual([
      { ts: 42, level: "warn", scope: "walk.api", message: "slow", meta: { ms: 1200 } },
      { ts: 42, level: "error", scope: undefined, message: "bad", meta: undefined },
    ]);
    expect(logger.isLevelEnabled("debug")).toBe(false);
    expect(logger.isLevelEnabled("error")).toBe(true);
  });

  test("formats one line per entry", () => {
    expect(
      formatEntry({
        ts: 0,
        level: "warn",
        scope: "walk",
        message: "cannot write sync stamp",
        meta: { file: "/tmp/s" },
      }),
    ).toBe('WARN  [walk] cannot write sync stamp {"file":"/tmp/s"}');
    expect(formatEntry({ ts: 0, level: "error", message: "x" })).toBe("ERROR x");
  });

  test("parseLogLevel", () => {
    expect(parseLogLevel(" Debug ")).toBe("debug");
    expect(parseLogLevel("chatty", "warn")).toBe("warn");
    expect(parseLogLevel(undefined)).toBe("info");
  });
});
