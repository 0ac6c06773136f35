import type { Fragment } from "../ast";
import { scanExpansion } from "./scan-expansion";

export type Lookup = (name: string) => string | null | undefined;

/**
 * Substitute `$name` and `${name}` in an expandable fragment. Unknown or
 * unset names expand to the empty string.
 */
export function expandFragment(fragment: Fragment, lookup: Lookup): string {
  if (!fragment.expandable) return fragment.text;

  const text = fragment.text;
  let out = "";
  let i = 0;
  while (i < text.length) {
    const dollar = text.indexOf("$", i);
    if (dollar === -1) break;
    const exp = scanExpansion(text, dollar);
    if (!exp) {
      out += text.slice(i, dollar + 1);
      i = dollar + 1;
      continue;
    }
    out += text.slice(i, dollar) + (lookup(exp.name) ?? "");
    i = exp.end;
  }
  return out + text.slice(i);
}
