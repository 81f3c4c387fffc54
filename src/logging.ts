import { type LogLevel, readConfig } from "./config";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Console logger tagged with `[scope]`. Messages above `level` are dropped;
 * the level defaults to KERNELCUT_LOG_LEVEL.
 */
export function createLogger(
  scope: string,
  level: LogLevel = readConfig().logLevel,
): Logger {
  const prefix = `[${scope}]`;
  const enabled = (at: LogLevel) => LEVEL_RANK[at] <= LEVEL_RANK[level];
  return {
    debug(message) {
      if (enabled("debug")) console.debug(prefix, message);
    },
    info(message) {
      if (enabled("info")) console.info(prefix, message);
    },
    warn(message) {
      if (enabled("warn")) console.warn(prefix, message);
    },
    error(message) {
      if (enabled("error")) console.error(prefix, message);
    },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
