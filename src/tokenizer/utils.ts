import type { Token } from "./types";

/** The character an escape token stands for (everything after the backslash). */
export function escapedChar(token: Token): string {
  return token.value.slice(1);
}

export function isEscapedNewline(token: Token): boolean {
  return token.type === "escape" && token.value.endsWith("\n");
}
