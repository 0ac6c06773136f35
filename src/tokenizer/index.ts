export { tokenize } from "./tokenize";
export type { QuoteToken, QuoteValue, Token, TokenType } from "./types";
export { escapedChar, isEscapedNewline } from "./utils";
