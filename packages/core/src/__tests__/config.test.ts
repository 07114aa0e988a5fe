import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import {
  config,
  defineConfig,
  loadConfigFromEnv,
  loadConfigFromFiles,
  normalizeConfig,
} from "../config.js";

describe("loadConfigFromEnv", () => {
  it("reads LOCKSTEP_* variables as camelCase keys", () => {
    expect(
      loadConfigFromEnv({ LOCKSTEP_DEBUG: "1", LOCKSTEP_LOG_LEVEL: "info", HOME: "/home/test" }),
    ).toEqual({ debug: true, logLevel: "info" });
  });

  it("parses false-y values", () => {
    expect(loadConfigFromEnv({ LOCKSTEP_DEBUG: "false" })).toEqual({ debug: false });
    expect(loadConfigFromEnv({ LOCKSTEP_DEBUG: "" })).toEqual({ debug: false });
  });

  it("returns nothing when no variable is set", () => {
    expect(loadConfigFromEnv({})).toEqual({});
  });
});

describe("normalizeConfig", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("keeps known keys and ignores unknown ones", () => {
    expect(normalizeConfig({ debug: true, logLevel: "error", color: "blue" }, "test")).toEqual({
      debug: true,
      logLevel: "error",
    });
    expect(console.warn).not.toHaveBeenCalled();
  });

  it("drops invalid values with a warning", () => {
    expect(normalizeConfig({ logLevel: "loud" }, "environment")).toEqual({});
    expect(console.warn).toHaveBeenCalledWith(
      '[lockstep] Ignoring invalid value for "logLevel" from environment: "loud"',
    );
  });

  it("rejects non-objects", () => {
    expect(normalizeConfig([1, 2], "file.json")).toEqual({});
    expect(console.warn).toHaveBeenCalledWith("[lockstep] Ignoring config from file.json: expected an object");
  });
});

describe("config files", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lockstep-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    config.reset();
  });

  it("loads .locksteprc.json", () => {
    writeFileSync(join(dir, ".locksteprc.json"), JSON.stringify({ logLevel: "debug" }));
    expect(loadConfigFromFiles(dir)).toEqual({
      config: { logLevel: "debug" },
      filepath: join(dir, ".locksteprc.json"),
    });
  });

  it("loads the lockstep key of package.json", () => {
    writeFileSync(
      join(dir, "package.json"),
      JSON.stringify({ name: "fixture", lockstep: { debug: true } }),
    );
    expect(loadConfigFromFiles(dir).config).toEqual({ debug: true });
  });

  it("finds nothing in an empty directory", () => {
    expect(loadConfigFromFiles(dir)).toEqual({ config: {} });
  });

  it("env overrides files, defaults fill the rest", () => {
    writeFileSync(join(dir, ".locksteprc.json"), JSON.stringify({ logLevel: "info" }));

    config.load({ searchFrom: dir, env: {} });
    expect(config.get("logLevel")).toBe("info");
    expect(config.get("debug")).toBe(false);
    expect(config.getConfigFilePath()).toBe(join(dir, ".locksteprc.json"));

    config.load({ searchFrom: dir, env: { LOCKSTEP_LOG_LEVEL: "error" } });
    expect(config.get("logLevel")).toBe("error");
  });
});

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "lockstep-config-"));
    config.load({ searchFrom: dir, env: {} });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    config.reset();
  });

  it("starts from defaults", () => {
    expect(config.getAll()).toEqual({ debug: false, logLevel: "warn" });
    expect(config.getConfigFilePath()).toBeUndefined();
  });

  it("set merges values", () => {
    config.set({ logLevel: "debug" });
    expect(config.getAll()).toEqual({ debug: false, logLevel: "debug" });
  });

  it("programmatic values survive a reload", () => {
    config.set({ debug: true });
    config.load({ searchFrom: dir, env: { LOCKSTEP_DEBUG: "0" } });
    expect(config.get("debug")).toBe(true);
  });

  it("reset forgets programmatic values", () => {
    config.set({ logLevel: "off" });
    config.reset();
    config.load({ searchFrom: dir, env: {} });
    expect(config.get("logLevel")).toBe("warn");
  });
});

describe("config before loading", () => {
  afterEach(() => {
    config.reset();
  });

  it("peek sees defaults and set values without loading", () => {
    config.set({ logLevel: "info" });
    expect(config.peek("logLevel")).toBe("info");
    expect(config.peek("debug")).toBe(false);
    expect(config.isLoaded()).toBe(false);
  });

  it("set values still win once files are loaded", () => {
    const dir = mkdtempSync(join(tmpdir(), "lockstep-config-"));
    try {
      writeFileSync(join(dir, ".locksteprc.json"), JSON.stringify({ logLevel: "error", debug: true }));
      config.set({ logLevel: "info" });
      config.load({ searchFrom: dir, env: {} });

      expect(config.isLoaded()).toBe(true);
      expect(config.getAll()).toEqual({ debug: true, logLevel: "info" });
      expect(config.peek("debug")).toBe(true);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});

describe("defineConfig", () => {
  it("returns its argument", () => {
    const values = { debug: true };
    expect(defineConfig(values)).toBe(values);
  });
});
