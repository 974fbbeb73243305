export type * from "./types.js";
export type * from "./analyzer.js";
export type * from "./invertedIndex.js";
export * from "./errors.js";
export * from "./normalizer.js";
export * from "./tokenizer.js";
export * from "./query.js";
export * from "./selector.js";
export * from "./impl/index.js";
