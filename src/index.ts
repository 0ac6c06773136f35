export type {
  Assignment,
  Env,
  EnvInput,
  EnvUpdates,
  EvaluateOptions,
  Fragment,
} from "./ast";
export { resolveConfig } from "./config";
export type { EnvAssignConfig, LogLevel } from "./config";
export { EnvSyntaxError, formatSyntaxError } from "./errors";
export type { FormatErrorOptions, SyntaxErrorLocation } from "./errors";
export { EnvLayer, evaluate, expand, expandFragment } from "./expander";
export type { Lookup } from "./expander";
export { applyEnvSources, loadEnvFile, readEnvFile } from "./load";
export type { EnvSources } from "./load";
export { parse } from "./parse";
export { tokenize } from "./tokenizer";
export type { Token, TokenType } from "./tokenizer";
