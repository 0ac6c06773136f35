import { isNameChar, isNameStart } from "../tokenizer/charsets";

export type ScannedExpansion = {
  name: string;
  braced: boolean;
  /** Offset just past the expansion. */
  end: number;
};

/**
 * Scan a `$name` or `${name}` reference starting at `pos`. Returns null
 * when the `$` does not start one, in which case it is plain text.
 */
export function scanExpansion(
  source: string,
  pos: number,
): ScannedExpansion | null {
  if (source.charAt(pos) !== "$") return null;
  const braced = source.charAt(pos + 1) === "{";
  const start = braced ? pos + 2 : pos + 1;
  if (!isNameStart(source.charAt(start))) return null;

  let j = start + 1;
  while (j < source.length && isNameChar(source.charAt(j))) {
    j++;
  }
  const name = source.slice(start, j);
  if (!braced) {
    return { name, braced, end: j };
  }
  // ${name} must close right after the name
  if (source.charAt(j) !== "}") return null;
  return { name, braced, end: j + 1 };
}
