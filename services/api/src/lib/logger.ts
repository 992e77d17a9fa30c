import pino, { type Logger } from "pino";
import { envFlag, envOptional } from "./env";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

export function getLogLevel(): LogLevel {
  const raw = String(envOptional("LOG_LEVEL") ?? "").trim().toLowerCase();
  const hit = LEVELS.find((l) => l === raw);
  return hit ?? "info";
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const options: pino.LoggerOptions = {
      level: getLogLevel(),
      base: { service: "edit-classifier" },
      timestamp: pino.stdTimeFunctions.isoTime
    };
    rootLogger = envFlag("LOG_PRETTY")
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" }
          }
        })
      : pino(options);
  }
  return rootLogger;
}

/**
 * Module-scoped logger.
 *
 * @example
 * const log = createLogger("classify/pipeline");
 * log.info({ edits: 12 }, "classification started");
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}

export type { Logger };
