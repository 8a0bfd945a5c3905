import type { Term, Weight, Word } from "./types.js";

/**
 * Query contract shared by every backend, so they can be swapped behind the façade.
 *
 * Contract notes:
 * - results are ranked by descending weight, ties by ascending word
 * - an absent prefix/word throws NullArgumentError; no match is not an error
 * - `k` must be a non-negative integer
 */
export interface Autocompleter {
  /** Number of words in the dictionary. */
  readonly size: number;

  /** Up to `k` words starting with `prefix`, best first. */
  topMatches(prefix: string, k: number): Word[];
  /** Same as `topMatches` but keeps the weights. */
  rankedMatches(prefix: string, k: number): Term[];
  /** Best word starting with `prefix`, or "" when there is none. */
  topMatch(prefix: string): Word;
  /** Weight of the exact word; 0 when absent (indistinguishable from a stored 0). */
  weightOf(word: Word): Weight;
}
