import type { Assignment, Fragment } from "../ast";
import { EnvSyntaxError } from "../errors";
import type { QuoteToken, Token } from "../tokenizer";
import { escapedChar, isEscapedNewline, tokenize } from "../tokenizer";
import { isName } from "../tokenizer/charsets";

type TextToken = Extract<Token, { type: "text" }>;

/**
 * Single pass, pull-based parser over the token stream. Each `parse*`
 * method asks for the next token and never looks back.
 */
export class Parser {
  private readonly tokens: Iterator<Token, void, undefined>;

  constructor(private readonly source: string) {
    this.tokens = tokenize(source);
  }

  *parseAssignments(): Generator<Assignment, void, undefined> {
    let comment = false;
    for (let token = this.next(); token; token = this.next()) {
      if (token.type === "newline") {
        comment = false;
        continue;
      }
      if (comment) {
        // An escaped newline still ends the comment
        if (isEscapedNewline(token)) {
          comment = false;
        }
        continue;
      }
      switch (token.type) {
        case "comment":
          comment = true;
          break;
        case "ws":
          break;
        case "text":
          if (!isName(token.value)) {
            throw this.error(
              "Expected a variable assignment or comment",
              token,
            );
          }
          yield this.parseAssignment(token);
          break;
        case "assign":
        case "dquote":
        case "squote":
        case "escape":
          throw this.error("Expected a variable assignment or comment", token);
        default:
          return assertNever(token);
      }
    }
  }

  private parseAssignment(name: TextToken): Assignment {
    // Reported if the input ends right after the name
    let last: Token = {
      type: "text",
      value: "",
      line: name.line,
      column: name.column + name.value.length,
    };
    for (let token = this.next(); token; token = this.next()) {
      last = token;
      if (token.type === "ws") continue;
      if (token.type === "assign") {
        const value = this.parseValue();
        return value.length > 0
          ? { type: "Assignment", name: name.value, value, line: name.line }
          : { type: "Assignment", name: name.value, line: name.line };
      }
      break;
    }
    throw this.error("Expected '=' after variable name", last);
  }

  private parseValue(): Fragment[] {
    const fragments: Fragment[] = [];
    let comment = false;
    for (let token = this.next(); token; token = this.next()) {
      if (token.type === "newline") break;
      if (comment) {
        if (isEscapedNewline(token)) break;
        continue;
      }
      switch (token.type) {
        case "comment":
          // Only a hash after white space starts a comment
          if (fragments.at(-1)?.whitespace) {
            comment = true;
          } else {
            fragments.push(literal(token.value));
          }
          break;
        case "ws":
          fragments.push({
            text: token.value,
            expandable: false,
            whitespace: true,
          });
          break;
        case "assign":
          fragments.push(literal(token.value));
          break;
        case "text":
          fragments.push(quotable(token.value, true));
          break;
        case "dquote":
        case "squote":
          fragments.push(...this.parseQuoted(token));
          break;
        case "escape":
          fragments.push(literal(escapedChar(token)));
          break;
        default:
          return assertNever(token);
      }
    }
    return trimWhitespace(fragments);
  }

  private parseQuoted(quote: QuoteToken): Fragment[] {
    const fragments: Fragment[] = [];
    const expandable = quote.type === "dquote";
    for (let token = this.next(); token; token = this.next()) {
      switch (token.type) {
        case "dquote":
        case "squote":
          if (token.type === quote.type && token.value === quote.value) {
            if (fragments.length === 0) {
              fragments.push(literal(""));
            }
            return fragments;
          }
          fragments.push(quotable(token.value, expandable));
          break;
        case "escape":
          if (quote.type === "dquote") {
            fragments.push(literal(escapedChar(token)));
            break;
          }
          // \' ends a single-quoted string, leaving the backslash behind
          if (escapedChar(token) === quote.value) {
            fragments.push(literal("\\"));
            return fragments;
          }
          fragments.push(literal(token.value));
          break;
        case "assign":
        case "comment":
        case "newline":
        case "text":
        case "ws":
          fragments.push(quotable(token.value, expandable));
          break;
        default:
          return assertNever(token);
      }
    }
    throw this.error("Expected a matching end quote", quote);
  }

  private next(): Token | undefined {
    const result = this.tokens.next();
    return result.done ? undefined : result.value;
  }

  private error(message: string, token: Token): EnvSyntaxError {
    const column = token.column + 1;
    return new EnvSyntaxError(message, {
      line: token.line,
      column,
      endColumn: column + token.value.length,
      text: this.source.split("\n")[token.line - 1] ?? "",
    });
  }
}

const literal = (text: string): Fragment => ({
  text,
  expandable: false,
  whitespace: false,
});

const quotable = (text: string, expandable: boolean): Fragment => ({
  text,
  expandable,
  whitespace: false,
});

function trimWhitespace(fragments: Fragment[]): Fragment[] {
  let start = 0;
  let end = fragments.length;
  while (start < end && fragments[start]?.whitespace) start++;
  while (end > start && fragments[end - 1]?.whitespace) end--;
  return fragments.slice(start, end);
}

function assertNever(token: never): never {
  throw new Error(`Unhandled token: ${JSON.stringify(token)}`);
}
