import pino from "pino";
import type { Config } from "./config";

export function createLogger(config: Pick<Config, "log">) {
  // Use pretty printing in development, plain JSON in production
  const isDev = process.env.NODE_ENV !== "production";

  if (isDev && config.log.level !== "silent") {
    return pino({
      level: config.log.level,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    });
  }

  return pino({
    level: config.log.level,
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export type Logger = pino.Logger;
