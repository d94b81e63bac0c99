import { pino, type Logger } from "pino";
import { loadConfig, type LogLevel } from "./config.js";

export type { Logger };

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

/** Create the root logger. Components derive from it with `child({ component })`. */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? "plugin-protocol",
    level: options.level ?? loadConfig().logLevel,
  });
}

let rootLogger: Logger | undefined;

/** Process-wide logger used when a component is given none */
export function getLogger(): Logger {
  rootLogger ??= createLogger();
  return rootLogger;
}
