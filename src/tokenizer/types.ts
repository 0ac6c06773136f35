export type QuoteValue<Q extends string> = Q | `${Q}${Q}${Q}`;

type Position = { line: number; column: number };

export type Token =
  | ({ type: "assign"; value: "=" } & Position)
  | ({ type: "comment"; value: "#" } & Position)
  | ({ type: "dquote"; value: QuoteValue<'"'> } & Position)
  | ({ type: "squote"; value: QuoteValue<"'"> } & Position)
  | ({ type: "escape"; value: string } & Position)
  | ({ type: "newline"; value: "\n" } & Position)
  | ({ type: "text"; value: string } & Position)
  | ({ type: "ws"; value: string } & Position);

export type TokenType = Token["type"];

export type QuoteToken = Extract<Token, { type: "dquote" | "squote" }>;
