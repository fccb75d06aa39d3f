/**
 * Console logging with a LOG_LEVEL threshold
 */

import { env } from "./env.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

type ConsoleSink = Pick<Console, "log" | "warn" | "error">;

export function createLogger(
  level: LogLevel = env.LOG_LEVEL,
  sink: ConsoleSink = console,
): Logger {
  const enabled = (candidate: LogLevel) =>
    LEVEL_ORDER[candidate] >= LEVEL_ORDER[level];

  return {
    debug: (message) => {
      if (enabled("debug")) sink.log(`   🔍 ${message}`);
    },
    info: (message) => {
      if (enabled("info")) sink.log(message);
    },
    warn: (message) => {
      if (enabled("warn")) sink.warn(`⚠️  ${message}`);
    },
    error: (message) => {
      if (enabled("error")) sink.error(`❌ ${message}`);
    },
  };
}
