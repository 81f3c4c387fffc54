export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "warn",
  "info",
  "debug",
];

export const DEFAULT_LOG_LEVEL: LogLevel = "warn";

/**
 * Downstream hops the shape patch pass walks from a pack / strided-slice
 * node looking for an annotated reshape.
 */
export const DEFAULT_PATCH_MAX_HOPS = 4;

export type RuntimeConfig = {
  logLevel: LogLevel;
  patchMaxHops: number;
};

type Env = Record<string, string | undefined>;

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value == null) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized);
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value == null) {
    return undefined;
  }
  const trimmed = value.trim();
  const parsed = Number(trimmed);
  return trimmed !== "" && Number.isInteger(parsed) && parsed > 0
    ? parsed
    : undefined;
}

/**
 * Read runtime switches from the environment.
 *
 * KERNELCUT_LOG_LEVEL      silent | error | warn | info | debug
 * KERNELCUT_PATCH_MAX_HOPS positive integer
 */
export function readConfig(
  env: Env = typeof process !== "undefined" ? process.env : {},
): RuntimeConfig {
  return {
    logLevel: parseLogLevel(env.KERNELCUT_LOG_LEVEL) ?? DEFAULT_LOG_LEVEL,
    patchMaxHops:
      parsePositiveInt(env.KERNELCUT_PATCH_MAX_HOPS) ?? DEFAULT_PATCH_MAX_HOPS,
  };
}
