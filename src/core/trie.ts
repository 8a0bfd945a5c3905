import type { Weight, Word } from "./types.js";

/** Index of a node inside the trie's node arena. */
export type NodeId = number;

export interface TrieNode {
  /** Edge label leading into this node; empty for the root. */
  readonly character: string;
  /** Non-owning back-reference; null for the root. */
  readonly parent: NodeId | null;
  readonly children: ReadonlyMap<string, NodeId>;
  readonly terminal: boolean;
  /** Set iff `terminal`. */
  readonly word: Word | undefined;
  /** Meaningful iff `terminal`. */
  readonly weight: Weight;
  /** Max weight over the terminal nodes of this subtree, this node included. */
  readonly subtreeBestWeight: Weight;
}

/**
 * Read-only view of a weighted prefix trie.
 *
 * Contract notes:
 * - `subtreeBestWeight(node) >= subtreeBestWeight(child)` for every edge
 * - it is an upper bound, never an underestimate; after a weight is lowered it may be stale-high
 */
export interface ReadonlyTrie {
  readonly root: NodeId;
  /** Number of distinct words stored. */
  readonly size: number;
  readonly nodeCount: number;

  node(id: NodeId): TrieNode;
  child(id: NodeId, ch: string): NodeId | undefined;
  children(id: NodeId): ReadonlyMap<string, NodeId>;

  /** Node reached by walking `prefix` from the root, or undefined if it leaves the trie. */
  locate(prefix: string): NodeId | undefined;
  /** Walks parent links back to the root and returns the edge labels in order. */
  pathOf(id: NodeId): string;

  /** Stored weight of the exact word, 0 if absent. */
  weightOf(word: Word): Weight;
}

/** Prefix trie for the term dictionary. */
export interface Trie extends ReadonlyTrie {
  /** Adds `word` or overwrites its weight, raising subtree bounds along the path. */
  insert(word: Word, weight: Weight): void;
}
