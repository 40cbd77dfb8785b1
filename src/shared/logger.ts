import pino from "pino";
import type { LogLevel } from "./types.js";

export type Logger = pino.Logger;

export function createLogger(level: LogLevel | "silent"): Logger {
  return pino({
    level,
    timestamp: pino.stdTimeFunctions.isoTime
  });
}
