import { readFile } from "fs/promises";
import type { Env, EnvInput, EvaluateOptions } from "./ast";
import { EnvSyntaxError } from "./errors";
import { EnvLayer, expand } from "./expander";
import { logger } from "./logger";

export type EnvSources = {
  /** Inline assignments, or variables to set as-is. */
  env?: string | Readonly<Record<string, string>>;
  /** Path of an env file applied after `env`. */
  envFile?: string;
};

export function readEnvFile(path: string): Promise<string> {
  return readFile(path, "utf-8");
}

/**
 * Read an env file and expand it over `base`. Syntax errors are rethrown
 * with `source` set to the file path.
 */
export async function loadEnvFile(
  path: string,
  base: EnvInput,
  options: EvaluateOptions = {},
): Promise<Env> {
  const source = await readEnvFile(path);
  try {
    const env = expand(source, base, options);
    logger.debug(`Loaded env file ${path}`, { bytes: source.length });
    return env;
  } catch (error) {
    if (error instanceof EnvSyntaxError) {
      error.source = path;
    }
    throw error;
  }
}

/** Apply an inline env and then an env file on top of `base`. */
export async function applyEnvSources(
  base: EnvInput,
  sources: EnvSources,
  options: EvaluateOptions = {},
): Promise<Env> {
  let env: EnvInput = base;
  if (typeof sources.env === "string") {
    env = expand(sources.env, env, options);
  } else if (sources.env) {
    env = { ...env, ...sources.env };
  }
  if (sources.envFile) {
    env = await loadEnvFile(sources.envFile, env, options);
  }
  return new EnvLayer(env, options).toEnv();
}
