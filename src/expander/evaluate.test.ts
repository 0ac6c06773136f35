import { describe, expect, it } from "vitest";
import { EnvSyntaxError } from "../errors";
import { evaluate, expand } from "./evaluate";

describe("expand", () => {
  it("resolves quoting and escapes", () => {
    const input = [
      "first=1st",
      'second="2"nd',
      'escaped_dquote="this \\" is escaped"',
      "mixed=\"this is quoted\" in 'multiple ways'",
    ].join("\n");
    expect(expand(input, {})).toEqual({
      first: "1st",
      second: "2nd",
      escaped_dquote: 'this " is escaped',
      mixed: "this is quoted in multiple ways",
    });
  });

  it("absorbs the next line after an escaped newline", () => {
    expect(expand("foo=\\\nbar=43", {})).toEqual({ foo: "\nbar=43" });
  });

  it("keeps empty strings and removes unset names", () => {
    const base = { unset: "x", kept: "y" };
    expect(expand('empty_string=""\nunset=', base)).toEqual({
      empty_string: "",
      kept: "y",
    });
  });

  it("substitutes earlier assignments before the base", () => {
    expect(expand("a=1\nb=$a${c}", { a: "0", c: "z" })).toEqual({
      a: "1",
      b: "1z",
      c: "z",
    });
  });

  it("lets later assignments win", () => {
    expect(expand("a=1\na=2\nb=$a", {})).toEqual({ a: "2", b: "2" });
  });

  it("never expands single-quoted text", () => {
    expect(expand("a='$HOME ${HOME}'\nb=\\$HOME", { HOME: "/h" })).toEqual({
      HOME: "/h",
      a: "$HOME ${HOME}",
      b: "$HOME",
    });
  });

  it("does not change the base", () => {
    const base = { A: "1", B: "2" };
    expand("A=2\nB=", base);
    expect(base).toEqual({ A: "1", B: "2" });
  });

  it("skips base entries without a value", () => {
    expect(expand("x=[$A$B]", { A: undefined, B: null })).toEqual({
      x: "[]",
    });
  });

  it("ignores names inherited from Object.prototype", () => {
    expect(expand("x=[$constructor$toString]", {})).toEqual({ x: "[]" });
  });

  it("matches names exactly by default", () => {
    expect(expand("path=/x", { PATH: "/usr/bin" })).toEqual({
      PATH: "/usr/bin",
      path: "/x",
    });
  });

  it("uppercases names when case-insensitive", () => {
    const options = { caseInsensitive: true };
    expect(expand("path=/x\nnew=$Path", { PATH: "/usr/bin" }, options)).toEqual(
      { PATH: "/x", NEW: "/x" },
    );
    expect(expand("", { Path: "/a" }, options)).toEqual({ PATH: "/a" });
  });

  it("propagates syntax errors", () => {
    expect(() => expand('a="x', {})).toThrow(EnvSyntaxError);
    expect(() => expand("a=1\nb", {})).toThrow(
      "Expected '=' after variable name",
    );
  });
});

describe("evaluate", () => {
  it("returns only the updates", () => {
    expect(evaluate("a=1", { b: "2" })).toEqual(new Map([["a", "1"]]));
  });

  it("marks unset names with null", () => {
    expect(evaluate('empty_string=""\nunset=', {})).toEqual(
      new Map<string, string | null>([
        ["empty_string", ""],
        ["unset", null],
      ]),
    );
  });

  it("expands an unset name to the empty string", () => {
    expect(evaluate("HOME=\nx=[$HOME]", { HOME: "/root" })).toEqual(
      new Map<string, string | null>([
        ["HOME", null],
        ["x", "[]"],
      ]),
    );
  });

  it("resolves unknown names to the empty string", () => {
    const updates = evaluate('msg="Some $foo is ${path}."', { foo: "bar" });
    expect(updates.get("msg")).toBe("Some bar is .");
  });

  it("normalizes assignment and lookup names together", () => {
    expect(
      evaluate("Foo=1\nfoo=${FOO}2", {}, { caseInsensitive: true }),
    ).toEqual(new Map([["FOO", "12"]]));
  });
});
