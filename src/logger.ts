import pino, { type Logger } from "pino";

import type { OverviewConfig } from "./config/overview_config";

export type OverviewLogger = Pick<Logger, "debug" | "info" | "warn">;

export function buildLoggerOptions(config: OverviewConfig) {
  return {
    level: config.logLevel,
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.isDev && config.prettyLogs
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  };
}

// Used when a caller does not pass its own logger (tests, library use).
export const silentLogger: OverviewLogger = pino({ level: "silent" });
