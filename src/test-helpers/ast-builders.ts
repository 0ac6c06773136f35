import type { Assignment, Fragment } from "../ast";
import { parse } from "../parse";

export const lit = (text: string): Fragment => ({
  text,
  expandable: false,
  whitespace: false,
});
export const exp = (text: string): Fragment => ({
  text,
  expandable: true,
  whitespace: false,
});
export const ws = (text: string): Fragment => ({
  text,
  expandable: false,
  whitespace: true,
});

export const assign = (
  name: string,
  line: number,
  ...value: Fragment[]
): Assignment => ({ type: "Assignment", name, value, line });

export const unset = (name: string, line: number): Assignment => ({
  type: "Assignment",
  name,
  line,
});

export const parseAll = (source: string): Assignment[] => [...parse(source)];

/** Value text of the single assignment in `source`, before expansion. */
export function valueText(source: string): string | undefined {
  const [first] = parseAll(source);
  return first?.value?.map((fragment) => fragment.text).join("");
}
