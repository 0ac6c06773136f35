import type { Env, EnvInput, EnvUpdates, EvaluateOptions } from "../ast";
import { parse } from "../parse";
import { EnvLayer } from "./env-layer";
import { expandFragment } from "./expand-fragment";

function applyAssignments(env: EnvLayer, source: string): void {
  const lookup = (name: string) => env.get(name);
  for (const { name, value } of parse(source)) {
    env.set(
      name,
      value
        ? value.map((fragment) => expandFragment(fragment, lookup)).join("")
        : null,
    );
  }
}

/**
 * Parse `source` and return the updates it makes to `base`, which is left
 * unchanged. Unset variables map to `null`.
 */
export function evaluate(
  source: string,
  base: EnvInput,
  options: EvaluateOptions = {},
): EnvUpdates {
  const env = new EnvLayer(base, options);
  applyAssignments(env, source);
  return env.updates;
}

/**
 * Return a copy of `base` with the assignments in `source` applied.
 * Unset variables are removed.
 */
export function expand(
  source: string,
  base: EnvInput,
  options: EvaluateOptions = {},
): Env {
  const env = new EnvLayer(base, options);
  applyAssignments(env, source);
  return env.toEnv();
}
