import { describe, it, expect, afterEach } from "vitest";
import {
  createLogger,
  getDefaultLogLevel,
  isLogLevel,
  setDefaultLogLevel,
  type LogSink,
} from "../src/logger.js";

function collect(): { sink: LogSink; lines: string[] } {
  const lines: string[] = [];
  return { sink: (line) => lines.push(line), lines };
}

describe("logger", () => {
  afterEach(() => {
    setDefaultLogLevel("info");
  });

  it("prefixes info lines with the scope only", () => {
    const { sink, lines } = collect();
    createLogger("model", { sink }).info("imported 3 types");
    expect(lines).toEqual(["[model] imported 3 types"]);
  });

  it("labels other levels", () => {
    const { sink, lines } = collect();
    const log = createLogger("model", { sink, level: "debug" });
    log.debug("a");
    log.warn("b");
    log.error("c");
    expect(lines).toEqual(["[model] debug: a", "[model] warn: b", "[model] error: c"]);
  });

  it("drops messages below the level", () => {
    const { sink, lines } = collect();
    const log = createLogger("model", { sink, level: "warn" });
    log.debug("hidden");
    log.info("hidden");
    log.warn("shown");
    expect(lines).toEqual(["[model] warn: shown"]);
  });

  it("silent drops everything", () => {
    const { sink, lines } = collect();
    const log = createLogger("model", { sink, level: "silent" });
    log.error("hidden");
    expect(lines).toEqual([]);
  });

  it("follows the default level when none is fixed", () => {
    const { sink, lines } = collect();
    const log = createLogger("server", { sink });
    log.debug("before");
    setDefaultLogLevel("debug");
    log.debug("after");
    expect(getDefaultLogLevel()).toBe("debug");
    expect(log.level).toBe("debug");
    expect(lines).toEqual(["[server] debug: after"]);
  });

  it("child loggers extend the scope", () => {
    const { sink, lines } = collect();
    createLogger("model", { sink }).child("import").info("phase 1");
    expect(lines).toEqual(["[model:import] phase 1"]);
  });

  it("recognizes level names", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
