export type EvaluateOptions = {
  /**
   * Uppercase variable names before using them as keys, the way
   * environment variables behave on Windows.
   */
  caseInsensitive?: boolean;
};

export type Fragment = {
  text: string;
  /** `$name` and `${name}` substitution applies to this text. */
  expandable: boolean;
  /** Insignificant white space, trimmed from either end of a value. */
  whitespace: boolean;
};

export type Assignment = {
  type: "Assignment";
  name: string;
  /** Missing when the variable is unset. */
  value?: Fragment[];
  line: number;
};

/** Base environment that assignments are layered over. */
export type EnvInput = Readonly<Record<string, string | null | undefined>>;

/** Result of evaluation; `null` marks a variable to delete. */
export type EnvUpdates = Map<string, string | null>;

export type Env = Record<string, string>;
