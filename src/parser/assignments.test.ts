import { describe, expect, it } from "vitest";
import { EnvSyntaxError } from "../errors";
import { parse } from "../parse";
import {
  assign,
  exp,
  lit,
  parseAll,
  unset,
  ws,
} from "../test-helpers/ast-builders";

describe("parse (assignments)", () => {
  it("parses empty and blank input", () => {
    expect(parseAll("")).toEqual([]);
    expect(parseAll(" \t\n\n  \n")).toEqual([]);
  });

  it("parses a simple assignment", () => {
    expect(parseAll("first=1st")).toEqual([assign("first", 1, exp("1st"))]);
  });

  it("parses assignments on separate lines", () => {
    expect(parseAll("a=1\n\nb=2\n")).toEqual([
      assign("a", 1, exp("1")),
      assign("b", 3, exp("2")),
    ]);
  });

  it("keeps the name as written", () => {
    expect(parseAll("Path=x\n_a1=y")).toEqual([
      assign("Path", 1, exp("x")),
      assign("_a1", 2, exp("y")),
    ]);
  });

  it("ignores white space around the name, equal sign and value", () => {
    expect(parseAll("  name \t=  value  ")).toEqual([
      assign("name", 1, exp("value")),
    ]);
  });

  it("keeps white space inside the value", () => {
    expect(parseAll("a = one  two ")).toEqual([
      assign("a", 1, exp("one"), ws("  "), exp("two")),
    ]);
  });

  it("treats an equal sign inside the value as text", () => {
    expect(parseAll("a=b=c")).toEqual([
      assign("a", 1, exp("b"), lit("="), exp("c")),
    ]);
  });

  it("marks a missing value as unset", () => {
    expect(parseAll("a=\nb =   \n")).toEqual([unset("a", 1), unset("b", 2)]);
  });

  it("unescapes characters in unquoted values", () => {
    expect(parseAll("a=\\$HOME\\ x")).toEqual([
      assign("a", 1, lit("$"), exp("HOME"), lit(" "), exp("x")),
    ]);
  });

  it("keeps escaped white space when trimming", () => {
    expect(parseAll("a=\\  x \\ ")).toEqual([
      assign("a", 1, lit(" "), ws(" "), exp("x"), ws(" "), lit(" ")),
    ]);
  });

  it("continues a value across an escaped newline", () => {
    expect(parseAll("foo=\\\nbar=43")).toEqual([
      assign("foo", 1, lit("\n"), exp("bar"), lit("="), exp("43")),
    ]);
  });

  it("yields assignments before reaching a later error", () => {
    const assignments = parse("a=1\n!");
    expect(assignments.next().value).toEqual(assign("a", 1, exp("1")));
    expect(() => assignments.next()).toThrow(EnvSyntaxError);
  });
});
