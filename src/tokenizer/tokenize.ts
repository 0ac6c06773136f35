import { wsChars } from "./charsets";
import type { Token } from "./types";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

type Lexeme = DistributiveOmit<Token, "line" | "column">;

/**
 * Lazily split `source` into tokens.
 *
 * Never throws: any run of characters that is not one of the special
 * tokens is yielded as a `text` token.
 */
export function* tokenize(source: string): Generator<Token, void, undefined> {
  let i = 0;
  let line = 1;
  let lineStart = 0;
  let textStart = 0;

  while (i < source.length) {
    const lexeme = scanLexeme(source, i);
    if (!lexeme) {
      i += 1;
      continue;
    }

    if (textStart < i) {
      yield {
        type: "text",
        value: source.slice(textStart, i),
        line,
        column: textStart - lineStart,
      };
    }
    yield { ...lexeme, line, column: i - lineStart };

    i += lexeme.value.length;
    textStart = i;
    // Escaped newlines move to the next line too
    if (lexeme.value.endsWith("\n")) {
      line += 1;
      lineStart = i;
    }
  }

  if (textStart < source.length) {
    yield {
      type: "text",
      value: source.slice(textStart),
      line,
      column: textStart - lineStart,
    };
  }
}

// Order matters: triple quotes must be tried before single quotes.
function scanLexeme(source: string, pos: number): Lexeme | null {
  const ch = source.charAt(pos);
  switch (ch) {
    case "\\": {
      const next = source.codePointAt(pos + 1);
      if (next === undefined) return null;
      const width = next > 0xffff ? 2 : 1;
      return { type: "escape", value: source.slice(pos, pos + 1 + width) };
    }
    case "=":
      return { type: "assign", value: "=" };
    case "#":
      return { type: "comment", value: "#" };
    case '"':
      return {
        type: "dquote",
        value: source.startsWith('"""', pos) ? '"""' : '"',
      };
    case "\n":
      return { type: "newline", value: "\n" };
    case "'":
      return {
        type: "squote",
        value: source.startsWith("'''", pos) ? "'''" : "'",
      };
    default: {
      if (!wsChars.has(ch)) return null;
      let end = pos + 1;
      while (end < source.length && wsChars.has(source.charAt(end))) {
        end += 1;
      }
      return { type: "ws", value: source.slice(pos, end) };
    }
  }
}
