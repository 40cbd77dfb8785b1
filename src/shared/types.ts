export type LogLevel = "debug" | "info" | "warn" | "error";

export interface AppConfig {
  ffmpegPath: string;
  relayHost: string;
  publicHostname: string;
  reconcileIntervalSec: number;
  stopGraceSec: number;
  shutdownDeadlineSec: number;
  staleOutputSec: number;
  logBufferBytes: number;
  logFileBytes: number;
  autostartOnLoad: boolean;
  restartMaxAttempts: number;
  restartBackoffSec: number;
  logLevel: LogLevel;
}

export type ConfigKey = keyof AppConfig | "configDir";

export interface StreamConfig {
  name: string;
  sourceUrl: string;
  rtspPort: number;
}

export interface StreamStatus {
  running: boolean;
  reason: string;
  lastCheckedAt: string | null;
  exitCode: number | null;
}

export interface StreamRecord {
  config: StreamConfig;
  status: StreamStatus;
  createdAt: string;
}

export interface StreamView {
  config: StreamConfig;
  status: StreamStatus;
  inputUrl: string;
  outputUrl: string;
  restartCount: number;
}

export interface ProbeResult {
  alive: boolean;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  reason: string;
}

export interface WorkerHandleInfo {
  name: string;
  pid: number;
  startedAt: string;
}

export interface StopOutcome {
  forced: boolean;
  alreadyStopped: boolean;
}

export interface DaemonRuntime {
  pid: number;
  port: number;
  token: string;
  startedAt: string;
  configDir: string;
}

export interface DaemonStatus {
  running: boolean;
  pid?: number;
  port?: number;
  uptimeSec?: number;
  streams: number;
  runningWorkers: number;
  lastReconcileAt?: string;
}
