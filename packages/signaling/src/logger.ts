import pino from "pino";
import type { SignalingConfig } from "./config.js";

export type LogLevel = SignalingConfig["log"]["level"];
export type LogFormat = SignalingConfig["log"]["format"];

export interface ResolvedLogConfig {
  level: LogLevel;
  format: LogFormat;
}

let rootLogger: pino.Logger | undefined;

export function createRootLogger(config: ResolvedLogConfig): pino.Logger {
  const transport =
    config.format === "pretty"
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            singleLine: true,
            ignore: "pid,hostname",
          },
        }
      : undefined;

  rootLogger = pino({
    level: config.level,
    transport,
    redact: ["token", "headers.authorization"],
  });

  return rootLogger;
}

export function getRootLogger(): pino.Logger {
  if (!rootLogger) {
    throw new Error("Root logger not initialized. Call createRootLogger first.");
  }
  return rootLogger;
}

export function createChildLogger(name: string): pino.Logger {
  return getRootLogger().child({ name });
}
