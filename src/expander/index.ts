export { EnvLayer } from "./env-layer";
export { evaluate, expand } from "./evaluate";
export { expandFragment } from "./expand-fragment";
export type { Lookup } from "./expand-fragment";
export { scanExpansion } from "./scan-expansion";
export type { ScannedExpansion } from "./scan-expansion";
