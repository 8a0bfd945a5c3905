export type * from "./types.js";
export type * from "./heap.js";
export type * from "./trie.js";
export type * from "./autocompleter.js";
export * from "./errors.js";
export * from "./term.js";
export * from "./impl/index.js";
