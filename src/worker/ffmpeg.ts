import { spawnSync } from "node:child_process";
import { buildRtspUrl } from "../core/stream.js";
import type { StreamConfig } from "../shared/types.js";

export interface WorkerCommand {
  command: string;
  args: string[];
}

export type WorkerCommandBuilder = (config: StreamConfig) => WorkerCommand;

export interface FfmpegOptions {
  binaryPath: string;
  relayHost: string;
}

export function ffmpegArgs(config: StreamConfig, relayHost: string): string[] {
  return [
    "-nostdin",
    "-hide_banner",
    "-re",
    "-i",
    config.sourceUrl,
    "-c",
    "copy",
    "-bufsize",
    "5000k",
    "-f",
    "rtsp",
    "-rtsp_transport",
    "tcp",
    buildRtspUrl(relayHost, config)
  ];
}

export function ffmpegCommandBuilder(options: FfmpegOptions): WorkerCommandBuilder {
  return (config) => ({
    command: options.binaryPath,
    args: ffmpegArgs(config, options.relayHost)
  });
}

export function assertFfmpegAvailable(binaryPath: string): void {
  const result = spawnSync(binaryPath, ["-version"], {
    stdio: "ignore"
  });
  if (result.error || result.status !== 0) {
    throw new Error(
      `Unable to execute ffmpeg binary at '${binaryPath}'. Set config ffmpegPath to a valid executable.`
    );
  }
}
