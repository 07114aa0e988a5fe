import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { config } from "../config.js";
import { createLogger, formatLogLine } from "../logger.js";

describe("formatLogLine", () => {
  it("prefixes the scope and level", () => {
    expect(formatLogLine("zip", "debug", "started")).toBe("[lockstep/zip] DEBUG: started");
  });

  it("appends the context as JSON", () => {
    expect(formatLogLine("zip", "warn", "uneven", { position: 3, strategy: "fail" })).toBe(
      '[lockstep/zip] WARN: uneven {"position":3,"strategy":"fail"}',
    );
  });
});

describe("createLogger with a fixed level", () => {
  it("writes messages at or above the level", () => {
    const lines: string[] = [];
    const log = createLogger("test", { level: "info", writer: (line) => lines.push(line) });

    log.error("e");
    log.warn("w");
    log.info("i");
    log.debug("d");

    expect(lines).toEqual([
      "[lockstep/test] ERROR: e",
      "[lockstep/test] WARN: w",
      "[lockstep/test] INFO: i",
    ]);
  });

  it("writes nothing when off", () => {
    const lines: string[] = [];
    const log = createLogger("test", { level: "off", writer: (line) => lines.push(line) });
    log.error("e");
    expect(lines).toEqual([]);
    expect(log.isEnabled("error")).toBe(false);
  });
});

describe("createLogger with the configured level", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lockstep-logger-"));
    config.load({ searchFrom: dir, env: {} });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    config.reset();
    vi.restoreAllMocks();
  });

  it("defaults to warn", () => {
    const log = createLogger("test");
    expect(log.isEnabled("warn")).toBe(true);
    expect(log.isEnabled("info")).toBe(false);
  });

  it("follows config changes made after creation", () => {
    const log = createLogger("test");
    config.set({ logLevel: "debug" });
    expect(log.isEnabled("debug")).toBe(true);
  });

  it("debug mode enables debug output", () => {
    config.set({ debug: true, logLevel: "error" });
    expect(createLogger("test").isEnabled("debug")).toBe(true);
  });

  it("routes to console by level", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const error = vi.spyOn(console, "error").mockImplementation(() => {});

    const log = createLogger("test");
    log.warn("careful", { n: 1 });
    log.error("broken");

    expect(warn).toHaveBeenCalledWith('[lockstep/test] WARN: careful {"n":1}');
    expect(error).toHaveBeenCalledWith("[lockstep/test] ERROR: broken");
  });
});
