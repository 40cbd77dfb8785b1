import os from "node:os";
import path from "node:path";
import type { AppConfig } from "./types.js";

export const APP_NAME = "rtsp-bridge";
export const DB_FILE_NAME = "state.db";
export const RUNTIME_FILE_NAME = "runtime.json";
export const BOOTSTRAP_FILE_NAME = "bootstrap.json";
export const LOCK_FILE_NAME = "daemon.lock";
export const LOGS_DIR_NAME = "logs";

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".config", APP_NAME);

export const DEFAULT_CONFIG: AppConfig = {
  ffmpegPath: "ffmpeg",
  relayHost: "localhost",
  publicHostname: "localhost",
  reconcileIntervalSec: 5,
  stopGraceSec: 5,
  shutdownDeadlineSec: 10,
  staleOutputSec: 30,
  logBufferBytes: 256 * 1024,
  logFileBytes: 1024 * 1024,
  autostartOnLoad: false,
  restartMaxAttempts: 0,
  restartBackoffSec: 2,
  logLevel: "info"
};

export const DEFAULT_RTSP_PORT = 8554;
export const DEFAULT_LOG_TAIL_BYTES = 64 * 1024;
export const MIN_RTSP_PORT = 1024;
export const MAX_RTSP_PORT = 65535;

export const DAEMON_HOST = "127.0.0.1";
export const HTTP_API_PREFIX = "/v1";
