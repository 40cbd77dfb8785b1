import { InvalidConfigError } from "../shared/errors.js";
import { MAX_RTSP_PORT, MIN_RTSP_PORT } from "../shared/constants.js";
import type { StreamConfig, StreamRecord, StreamView } from "../shared/types.js";

export interface StreamInput {
  name: string;
  sourceUrl: string;
  rtspPort: number;
}

export function validateStreamConfig(input: StreamInput): StreamConfig {
  const name = input.name.trim();
  if (!name) {
    throw new InvalidConfigError("Stream name cannot be empty");
  }
  if (/\s/.test(name)) {
    throw new InvalidConfigError(`Stream name cannot contain whitespace: ${name}`);
  }

  const sourceUrl = input.sourceUrl.trim();
  if (!sourceUrl.startsWith("rtmp://")) {
    throw new InvalidConfigError(`Source URL must start with rtmp://: ${sourceUrl}`);
  }

  if (!Number.isInteger(input.rtspPort) || input.rtspPort < MIN_RTSP_PORT || input.rtspPort > MAX_RTSP_PORT) {
    throw new InvalidConfigError(`RTSP port must be an integer between ${MIN_RTSP_PORT} and ${MAX_RTSP_PORT}`);
  }

  return { name, sourceUrl, rtspPort: input.rtspPort };
}

export function parsePortInput(value: string): number {
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  if (!trimmed || !Number.isInteger(parsed)) {
    throw new InvalidConfigError(`Invalid RTSP port: ${value}`);
  }
  return parsed;
}

export function buildRtspUrl(host: string, config: StreamConfig): string {
  return `rtsp://${host}:${config.rtspPort}/${config.name}`;
}

export function toStreamView(record: StreamRecord, publicHostname: string, restartCount = 0): StreamView {
  return {
    config: record.config,
    status: record.status,
    inputUrl: record.config.sourceUrl,
    outputUrl: buildRtspUrl(publicHostname, record.config),
    restartCount
  };
}
