import { describe, it, expect } from "vitest";
import { createLogger, parseLogLevel } from "../src/logger.js";

function capture() {
  const lines: string[] = [];
  const sink = (line: string) => {
    lines.push(line);
  };
  return { lines, sink };
}

describe("logger", () => {
  it("prefixes lines with the scope and tags non-info levels", () => {
    const { lines, sink } = capture();
    const log = createLogger("network", { level: "debug", sink });

    log.debug("walk");
    log.info("loaded");
    log.warn("clamped");
    log.error("failed");

    expect(lines).toEqual([
      "[network] DEBUG walk",
      "[network] loaded",
      "[network] WARN clamped",
      "[network] ERROR failed",
    ]);
  });

  it("drops messages below the threshold", () => {
    const { lines, sink } = capture();
    const log = createLogger("geo", { level: "warn", sink });

    log.info("ignored");
    log.warn("kept");

    expect(lines).toEqual(["[geo] WARN kept"]);
  });

  it("silent suppresses everything", () => {
    const { lines, sink } = capture();
    const log = createLogger("geo", { level: "silent", sink });
    log.error("nope");
    expect(lines).toEqual([]);
  });

  it("parseLogLevel normalises and falls back to info", () => {
    expect(parseLogLevel(" WARN ")).toBe("warn");
    expect(parseLogLevel("verbose")).toBe("info");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("toString")).toBe("info");
  });
});
