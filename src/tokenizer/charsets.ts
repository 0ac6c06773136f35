// White space minus newline
export const wsChars = new Set([" ", "\t", "\r", "\f", "\v"]);

export const isNameChar = (c: string) =>
  (c >= "a" && c <= "z") ||
  (c >= "A" && c <= "Z") ||
  (c >= "0" && c <= "9") ||
  c === "_";

export const isNameStart = (c: string) =>
  (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";

export function isName(value: string): boolean {
  if (!isNameStart(value.charAt(0))) return false;
  for (let i = 1; i < value.length; i++) {
    if (!isNameChar(value.charAt(i))) return false;
  }
  return true;
}
