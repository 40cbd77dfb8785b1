import { DEFAULT_CONFIG } from "../shared/constants.js";
import type { AppConfig, ConfigKey, LogLevel } from "../shared/types.js";
import { InvalidConfigError } from "../shared/errors.js";

export const CONFIG_KEYS: (keyof AppConfig)[] = [
  "ffmpegPath",
  "relayHost",
  "publicHostname",
  "reconcileIntervalSec",
  "stopGraceSec",
  "shutdownDeadlineSec",
  "staleOutputSec",
  "logBufferBytes",
  "logFileBytes",
  "autostartOnLoad",
  "restartMaxAttempts",
  "restartBackoffSec",
  "logLevel"
];

const LOG_LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

type ConfigParsers = { [K in keyof AppConfig]: (value: string) => AppConfig[K] };

const PARSERS: ConfigParsers = {
  ffmpegPath: (value) => parseNonEmpty("ffmpegPath", value),
  relayHost: (value) => parseNonEmpty("relayHost", value),
  publicHostname: (value) => parseNonEmpty("publicHostname", value),
  reconcileIntervalSec: (value) => parseIntAtLeast("reconcileIntervalSec", value, 1),
  stopGraceSec: (value) => parseIntAtLeast("stopGraceSec", value, 1),
  shutdownDeadlineSec: (value) => parseIntAtLeast("shutdownDeadlineSec", value, 1),
  staleOutputSec: (value) => parseIntAtLeast("staleOutputSec", value, 0),
  logBufferBytes: (value) => parseIntAtLeast("logBufferBytes", value, 1024),
  logFileBytes: (value) => parseLogFileBytes(value),
  autostartOnLoad: (value) => parseBoolean("autostartOnLoad", value),
  restartMaxAttempts: (value) => parseIntAtLeast("restartMaxAttempts", value, 0),
  restartBackoffSec: (value) => parseIntAtLeast("restartBackoffSec", value, 1),
  logLevel: (value) => {
    const level = LOG_LEVELS.find((candidate) => candidate === value.trim());
    if (!level) {
      throw new InvalidConfigError(`logLevel must be one of: ${LOG_LEVELS.join(", ")}`);
    }
    return level;
  }
};

export function parseConfigValue<K extends keyof AppConfig>(key: K, value: string): AppConfig[K] {
  return PARSERS[key](value);
}

export function stringifyConfigValue<K extends keyof AppConfig>(value: AppConfig[K]): string {
  return String(value);
}

export function configKeyFromInput(key: string): ConfigKey {
  if (key === "configDir") {
    return key;
  }

  const match = CONFIG_KEYS.find((candidate) => candidate === key);
  if (match) {
    return match;
  }

  throw new InvalidConfigError(`Unknown config key: ${key}`);
}

export function mergeConfig(dbValues: Partial<Record<keyof AppConfig, string>>): AppConfig {
  return {
    ffmpegPath: resolveValue(dbValues, "ffmpegPath"),
    relayHost: resolveValue(dbValues, "relayHost"),
    publicHostname: resolveValue(dbValues, "publicHostname"),
    reconcileIntervalSec: resolveValue(dbValues, "reconcileIntervalSec"),
    stopGraceSec: resolveValue(dbValues, "stopGraceSec"),
    shutdownDeadlineSec: resolveValue(dbValues, "shutdownDeadlineSec"),
    staleOutputSec: resolveValue(dbValues, "staleOutputSec"),
    logBufferBytes: resolveValue(dbValues, "logBufferBytes"),
    logFileBytes: resolveValue(dbValues, "logFileBytes"),
    autostartOnLoad: resolveValue(dbValues, "autostartOnLoad"),
    restartMaxAttempts: resolveValue(dbValues, "restartMaxAttempts"),
    restartBackoffSec: resolveValue(dbValues, "restartBackoffSec"),
    logLevel: resolveValue(dbValues, "logLevel")
  };
}

function resolveValue<K extends keyof AppConfig>(
  dbValues: Partial<Record<keyof AppConfig, string>>,
  key: K
): AppConfig[K] {
  const raw = dbValues[key];
  return raw !== undefined ? parseConfigValue(key, raw) : DEFAULT_CONFIG[key];
}

function parseNonEmpty(key: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new InvalidConfigError(`${key} cannot be empty`);
  }
  return trimmed;
}

function parseIntAtLeast(key: string, value: string, min: number): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!trimmed || !Number.isInteger(parsed) || parsed < min) {
    throw new InvalidConfigError(`${key} must be an integer >= ${min}`);
  }
  return parsed;
}

// 0 turns the per-stream log file off.
function parseLogFileBytes(value: string): number {
  const parsed = parseIntAtLeast("logFileBytes", value, 0);
  if (parsed !== 0 && parsed < 4096) {
    throw new InvalidConfigError("logFileBytes must be 0 or an integer >= 4096");
  }
  return parsed;
}

function parseBoolean(key: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "on"].includes(normalized)) {
    return true;
  }
  if (["false", "0", "no", "off"].includes(normalized)) {
    return false;
  }
  throw new InvalidConfigError(`${key} must be a boolean (true/false)`);
}
