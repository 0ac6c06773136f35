import type { EnvInput } from "./ast";

// winston's npm levels, most severe first
export const logLevels = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
  "silly",
] as const;

export type LogLevel = (typeof logLevels)[number];

export type EnvAssignConfig = {
  caseInsensitive: boolean;
  logLevel: LogLevel;
};

const truthy = new Set(["1", "true", "yes", "on"]);
const falsy = new Set(["0", "false", "no", "off"]);

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}

function parseFlag(value: string | null | undefined): boolean | undefined {
  const normalized = value?.trim().toLowerCase();
  if (normalized === undefined) return undefined;
  if (truthy.has(normalized)) return true;
  if (falsy.has(normalized)) return false;
  return undefined;
}

/**
 * Settings for the CLI and loaders. Case normalization follows the
 * platform unless ENV_ASSIGN_CASE_INSENSITIVE says otherwise.
 */
export function resolveConfig(
  env: EnvInput = process.env,
  platform: NodeJS.Platform = process.platform,
): EnvAssignConfig {
  const level = env.LOG_LEVEL?.trim().toLowerCase();
  return {
    caseInsensitive:
      parseFlag(env.ENV_ASSIGN_CASE_INSENSITIVE) ?? platform === "win32",
    logLevel: level !== undefined && isLogLevel(level) ? level : "warn",
  };
}
