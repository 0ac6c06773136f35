import type { Env, EnvInput, EnvUpdates, EvaluateOptions } from "../ast";

/**
 * Updates made by one evaluation pass, layered over a base environment.
 * The base is copied, never mutated.
 */
export class EnvLayer {
  readonly updates: EnvUpdates = new Map();
  private readonly base = new Map<string, string>();

  constructor(
    base: EnvInput,
    private readonly options: EvaluateOptions = {},
  ) {
    for (const [name, value] of Object.entries(base)) {
      if (value === undefined || value === null) continue;
      this.base.set(this.normalize(name), value);
    }
  }

  normalize(name: string): string {
    return this.options.caseInsensitive ? name.toUpperCase() : name;
  }

  /** An update shadows the base even when it unsets the name. */
  get(name: string): string | undefined {
    const key = this.normalize(name);
    if (this.updates.has(key)) {
      return this.updates.get(key) ?? undefined;
    }
    return this.base.get(key);
  }

  set(name: string, value: string | null): void {
    this.updates.set(this.normalize(name), value);
  }

  /** The base with every update applied and unset names removed. */
  toEnv(): Env {
    const merged = new Map(this.base);
    for (const [name, value] of this.updates) {
      if (value === null) {
        merged.delete(name);
      } else {
        merged.set(name, value);
      }
    }
    return Object.fromEntries(merged);
  }
}
