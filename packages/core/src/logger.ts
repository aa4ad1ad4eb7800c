import pino, { type Logger } from "pino";
import type { LoggingConfig } from "@stagewatch/contracts";

export type { Logger } from "pino";

export function createLogger(config: LoggingConfig, name = "stagewatch"): Logger {
  if (config.pretty) {
    return pino({
      name,
      level: config.level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      },
    });
  }
  return pino({ name, level: config.level });
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
