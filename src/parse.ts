import type { Assignment } from "./ast";
import { Parser } from "./parser/parser";

/**
 * Lazily parse env assignment text.
 *
 * Assignments are yielded in source order; an `EnvSyntaxError` is thrown
 * from the iteration that reaches the offending token.
 */
export function parse(source: string): Generator<Assignment, void, undefined> {
  return new Parser(source).parseAssignments();
}
