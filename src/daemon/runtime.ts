import path from "node:path";
import { RUNTIME_FILE_NAME } from "../shared/constants.js";
import type { DaemonRuntime } from "../shared/types.js";
import { ensureDirSync, readJsonFileSync, removeFileIfExists, writeJsonFileSync } from "../utils/fs.js";
import { isPidRunning } from "../utils/process.js";

export function runtimeFilePath(configDir: string): string {
  return path.join(configDir, RUNTIME_FILE_NAME);
}

/**
 * Returns the live daemon's runtime record. A malformed file, or one left by a
 * daemon that is no longer running, is removed and reported as absent.
 */
export function readRuntime(configDir: string): DaemonRuntime | null {
  const filePath = runtimeFilePath(configDir);
  const raw = readJsonFileSync<unknown>(filePath);
  if (raw === null) {
    return null;
  }

  const runtime = parseRuntime(raw);
  if (!runtime || !isPidRunning(runtime.pid)) {
    removeFileIfExists(filePath);
    return null;
  }
  return runtime;
}

export function writeRuntime(configDir: string, runtime: DaemonRuntime): void {
  ensureDirSync(configDir);
  writeJsonFileSync(runtimeFilePath(configDir), runtime);
}

export function clearRuntime(configDir: string): void {
  removeFileIfExists(runtimeFilePath(configDir));
}

export function parseRuntime(value: unknown): DaemonRuntime | null {
  if (typeof value !== "object" || value === null) {
    return null;
  }

  const pid = "pid" in value ? value.pid : undefined;
  const port = "port" in value ? value.port : undefined;
  const token = "token" in value ? value.token : undefined;
  const startedAt = "startedAt" in value ? value.startedAt : undefined;
  const configDir = "configDir" in value ? value.configDir : undefined;

  if (
    typeof pid !== "number" ||
    typeof port !== "number" ||
    typeof token !== "string" ||
    typeof startedAt !== "string" ||
    typeof configDir !== "string"
  ) {
    return null;
  }

  return { pid, port, token, startedAt, configDir };
}
