import fs from "node:fs";
import path from "node:path";
import { BOOTSTRAP_FILE_NAME, DEFAULT_CONFIG_DIR } from "../shared/constants.js";
import { ensureDirSync, readJsonFileSync, writeJsonFileSync } from "../utils/fs.js";
import { resolveDirPath } from "../utils/path.js";

export const CONFIG_DIR_ENV = "RTSP_BRIDGE_CONFIG_DIR";

export type ConfigDirSource = "flag" | "env" | "bootstrap" | "default";

export interface ResolvedConfigDir {
  dir: string;
  source: ConfigDirSource;
}

export function getBootstrapPath(): string {
  return path.join(DEFAULT_CONFIG_DIR, BOOTSTRAP_FILE_NAME);
}

export function locateConfigDir(cliOverride?: string, env: NodeJS.ProcessEnv = process.env): ResolvedConfigDir {
  if (cliOverride) {
    return { dir: resolveDirPath(cliOverride), source: "flag" };
  }

  const fromEnv = env[CONFIG_DIR_ENV];
  if (fromEnv) {
    return { dir: resolveDirPath(fromEnv), source: "env" };
  }

  const bootstrap = readJsonFileSync<unknown>(getBootstrapPath());
  if (typeof bootstrap === "object" && bootstrap !== null && "configDir" in bootstrap) {
    const { configDir } = bootstrap;
    if (typeof configDir === "string" && configDir.trim()) {
      return { dir: resolveDirPath(configDir), source: "bootstrap" };
    }
  }

  return { dir: DEFAULT_CONFIG_DIR, source: "default" };
}

export function resolveConfigDir(cliOverride?: string, env: NodeJS.ProcessEnv = process.env): string {
  return locateConfigDir(cliOverride, env).dir;
}

export function persistConfigDir(newConfigDir: string): void {
  const bootstrapPath = getBootstrapPath();
  ensureDirSync(path.dirname(bootstrapPath));
  writeJsonFileSync(bootstrapPath, { configDir: resolveDirPath(newConfigDir) });
}

/**
 * Copies the state database into a new config directory unless one is already
 * there. WAL sidecar files travel with it so committed writes are not lost.
 */
export function migrateDbIfNeeded(currentDbPath: string, nextDbPath: string): boolean {
  if (!fs.existsSync(currentDbPath) || fs.existsSync(nextDbPath)) {
    return false;
  }

  ensureDirSync(path.dirname(nextDbPath));
  fs.copyFileSync(currentDbPath, nextDbPath);
  for (const suffix of ["-wal", "-shm"]) {
    if (fs.existsSync(`${currentDbPath}${suffix}`)) {
      fs.copyFileSync(`${currentDbPath}${suffix}`, `${nextDbPath}${suffix}`);
    }
  }
  return true;
}
