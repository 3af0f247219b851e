import { afterEach, describe, expect, it } from "vitest";
import { createSubsystemLogger, formatTimestamp, resolveLogLevel, setLogSink } from "./logger.js";

describe("subsystem logger", () => {
  let restore: (() => void) | undefined;

  afterEach(() => {
    restore?.();
    restore = undefined;
  });

  it("prefixes lines with the time and subsystem", () => {
    const lines: string[] = [];
    restore = setLogSink((_level, line) => lines.push(line), "debug");

    createSubsystemLogger("enforcer").child("close").info("closed com.instagram.android");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[enforcer\/close\] closed com\.instagram\.android$/);
  });

  it("drops lines below the active level and appends errors", () => {
    const lines: Array<[string, string]> = [];
    restore = setLogSink((level, line) => lines.push([level, line]), "warn");
    const log = createSubsystemLogger("monitor");

    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    log.error("tick failed", "disk full");

    expect(lines.map(([level]) => level)).toEqual(["warn", "error"]);
    expect(lines[1]?.[1].endsWith("[monitor] tick failed: disk full")).toBe(true);
  });

  it("reads the level from the environment", () => {
    expect(resolveLogLevel({ SCREENPACT_LOG_LEVEL: " DEBUG " })).toBe("debug");
    expect(resolveLogLevel({ SCREENPACT_LOG_LEVEL: "loud" })).toBe("info");
    expect(formatTimestamp(new Date(2026, 1, 5, 9, 4, 7, 21))).toBe("[09:04:07.021]");
  });
});
