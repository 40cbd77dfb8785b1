import os from "node:os";
import path from "node:path";
import { describe, expect, it } from "vitest";
import { configKeyFromInput, mergeConfig, parseConfigValue } from "../src/config/settings.js";
import { resolveConfigDir } from "../src/config/bootstrap.js";
import { InvalidConfigError } from "../src/shared/errors.js";
import { DEFAULT_CONFIG } from "../src/shared/constants.js";

describe("autostartOnLoad config", () => {
  it("parses common true values", () => {
    expect(parseConfigValue("autostartOnLoad", "true")).toBe(true);
    expect(parseConfigValue("autostartOnLoad", "1")).toBe(true);
    expect(parseConfigValue("autostartOnLoad", "YES")).toBe(true);
    expect(parseConfigValue("autostartOnLoad", " on ")).toBe(true);
  });

  it("parses common false values", () => {
    expect(parseConfigValue("autostartOnLoad", "false")).toBe(false);
    expect(parseConfigValue("autostartOnLoad", "0")).toBe(false);
    expect(parseConfigValue("autostartOnLoad", "no")).toBe(false);
    expect(parseConfigValue("autostartOnLoad", "off")).toBe(false);
  });

  it("rejects invalid values", () => {
    expect(() => parseConfigValue("autostartOnLoad", "maybe")).toThrow(InvalidConfigError);
  });
});

describe("numeric config", () => {
  it("parses integers at or above the minimum", () => {
    expect(parseConfigValue("reconcileIntervalSec", "3")).toBe(3);
    expect(parseConfigValue("restartMaxAttempts", "0")).toBe(0);
  });

  it("rejects fractions, garbage and values below the minimum", () => {
    expect(() => parseConfigValue("stopGraceSec", "5.5")).toThrow("stopGraceSec must be an integer >= 1");
    expect(() => parseConfigValue("stopGraceSec", "abc")).toThrow(InvalidConfigError);
    expect(() => parseConfigValue("stopGraceSec", "")).toThrow(InvalidConfigError);
    expect(() => parseConfigValue("logBufferBytes", "512")).toThrow("logBufferBytes must be an integer >= 1024");
  });

  it("accepts 0 or a usable size for the log file cap", () => {
    expect(parseConfigValue("logFileBytes", "0")).toBe(0);
    expect(parseConfigValue("logFileBytes", "8192")).toBe(8192);
    expect(() => parseConfigValue("logFileBytes", "100")).toThrow("logFileBytes must be 0 or an integer >= 4096");
  });
});

describe("string config", () => {
  it("trims values and rejects empty ones", () => {
    expect(parseConfigValue("relayHost", "  relay.local ")).toBe("relay.local");
    expect(() => parseConfigValue("ffmpegPath", "   ")).toThrow("ffmpegPath cannot be empty");
  });

  it("accepts only known log levels", () => {
    expect(parseConfigValue("logLevel", "debug")).toBe("debug");
    expect(() => parseConfigValue("logLevel", "trace")).toThrow("logLevel must be one of: debug, info, warn, error");
  });
});

describe("mergeConfig", () => {
  it("falls back to defaults", () => {
    expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("uses persisted values over defaults", () => {
    const config = mergeConfig({ publicHostname: "cams.example.test", restartMaxAttempts: "3" });
    expect(config.publicHostname).toBe("cams.example.test");
    expect(config.restartMaxAttempts).toBe(3);
    expect(config.reconcileIntervalSec).toBe(DEFAULT_CONFIG.reconcileIntervalSec);
  });
});

describe("configKeyFromInput", () => {
  it("accepts known keys and configDir", () => {
    expect(configKeyFromInput("relayHost")).toBe("relayHost");
    expect(configKeyFromInput("configDir")).toBe("configDir");
  });

  it("rejects unknown keys", () => {
    expect(() => configKeyFromInput("outputDir")).toThrow("Unknown config key: outputDir");
  });
});

describe("resolveConfigDir", () => {
  it("prefers the command-line override", () => {
    const dir = path.join(os.tmpdir(), "bridge-cli");
    expect(resolveConfigDir(dir, { RTSP_BRIDGE_CONFIG_DIR: "/elsewhere" })).toBe(dir);
  });

  it("uses the environment variable next", () => {
    expect(resolveConfigDir(undefined, { RTSP_BRIDGE_CONFIG_DIR: "~/bridge" })).toBe(path.join(os.homedir(), "bridge"));
  });
});
