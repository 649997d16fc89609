import pino from "pino";
import type { Logger, LoggerOptions } from "pino";

export type InstallerLogger = Logger;

export interface LoggerFactoryOptions {
  level?: string;
  name?: string;
  pretty?: boolean;
}

function buildOptions(options: LoggerFactoryOptions = {}): LoggerOptions {
  const level = options.level || process.env.LOG_LEVEL || "info";
  const base: LoggerOptions = {
    level,
    name: options.name || "dialtone-install"
  };

  if (options.pretty || process.env.LOG_PRETTY === "true") {
    return {
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
          singleLine: true
        }
      }
    };
  }

  return base;
}

let rootLogger: Logger | null = null;

export function createLogger(options?: LoggerFactoryOptions): Logger {
  return pino(buildOptions(options));
}

export function getLogger(options?: LoggerFactoryOptions): Logger {
  if (!rootLogger) {
    rootLogger = createLogger(options);
  }
  return rootLogger;
}
