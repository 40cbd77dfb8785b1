import path from "node:path";
import { DbClient } from "../db/client.js";
import { locateConfigDir, type ConfigDirSource } from "../config/bootstrap.js";
import { mergeConfig, parseConfigValue, stringifyConfigValue } from "../config/settings.js";
import { createLogger, type Logger } from "../shared/logger.js";
import type { AppConfig } from "../shared/types.js";
import { LOGS_DIR_NAME } from "../shared/constants.js";
import { restartPolicyFromConfig } from "../core/restartPolicy.js";
import { StreamSupervisor } from "../supervisor/supervisor.js";
import { ChildProcessController } from "../worker/controller.js";
import { ffmpegCommandBuilder } from "../worker/ffmpeg.js";

export interface AppContext {
  configDir: string;
  configDirSource: ConfigDirSource;
  db: DbClient;
  config: AppConfig;
  logger: Logger;
  close(): void;
}

export function createAppContext(input: { configDirOverride?: string }): AppContext {
  const located = locateConfigDir(input.configDirOverride);
  const configDir = path.resolve(located.dir);
  const db = new DbClient(configDir);
  const config = mergeConfig(db.listConfigRaw());
  const logger = createLogger(config.logLevel);

  logger.debug({ configDir }, "context created");

  return {
    configDir,
    configDirSource: located.source,
    db,
    config,
    logger,
    close() {
      db.close();
    }
  };
}

export function createSupervisor(context: AppContext): StreamSupervisor {
  const { config, logger } = context;
  const controller = new ChildProcessController({
    buildCommand: ffmpegCommandBuilder({ binaryPath: config.ffmpegPath, relayHost: config.relayHost }),
    logger,
    stopGraceMs: config.stopGraceSec * 1000,
    logBufferBytes: config.logBufferBytes,
    staleOutputMs: config.staleOutputSec * 1000,
    logDir: path.join(context.configDir, LOGS_DIR_NAME),
    logFileBytes: config.logFileBytes
  });

  return new StreamSupervisor({
    store: context.db,
    controller,
    logger,
    publicHostname: config.publicHostname,
    reconcileIntervalMs: config.reconcileIntervalSec * 1000,
    restartPolicy: restartPolicyFromConfig(config),
    autostartOnLoad: config.autostartOnLoad
  });
}

export function setAppConfigValue<K extends keyof AppConfig>(
  context: AppContext,
  key: K,
  rawValue: string
): AppConfig[K] {
  const parsed = parseConfigValue(key, rawValue);
  context.db.setConfigValueRaw(key, stringifyConfigValue<K>(parsed));
  return parsed;
}
