import { Chalk } from "chalk";

export type SyntaxErrorLocation = {
  /** 1-based line number. */
  line: number;
  /** 1-based column of the offending token. */
  column: number;
  /** 1-based column just past the offending token. */
  endColumn: number;
  /** Source line containing the error, without its newline. */
  text: string;
  /** File the source was read from, when there is one. */
  source?: string;
};

/**
 * Raised when env assignment text does not follow the grammar.
 */
export class EnvSyntaxError extends Error {
  public readonly line: number;
  public readonly column: number;
  public readonly endColumn: number;
  public readonly text: string;
  public source?: string;

  constructor(message: string, location: SyntaxErrorLocation) {
    super(message);
    this.name = "EnvSyntaxError";
    this.line = location.line;
    this.column = location.column;
    this.endColumn = location.endColumn;
    this.text = location.text;
    this.source = location.source;

    Object.setPrototypeOf(this, EnvSyntaxError.prototype);
  }
}

export type FormatErrorOptions = {
  color?: boolean;
};

/**
 * Render a syntax error as `source:line:column: message` followed by the
 * offending line and a caret run under the token.
 */
export function formatSyntaxError(
  error: EnvSyntaxError,
  options: FormatErrorOptions = {},
): string {
  const c = new Chalk({ level: options.color ? 1 : 0 });
  const location = `${error.source ?? "<string>"}:${error.line}:${error.column}`;
  // Keep tabs so the carets line up with the source
  const indent = error.text
    .slice(0, error.column - 1)
    .replace(/[^\t]/g, " ");
  const carets = "^".repeat(Math.max(1, error.endColumn - error.column));
  return [
    `${c.cyan(location)}: ${c.red.bold(error.message)}`,
    `    ${error.text}`,
    `    ${indent}${c.red(carets)}`,
  ].join("\n");
}
