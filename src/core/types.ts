/** Shared core types used by module contracts. */

export type Word = string;
export type Weight = number;

/** A dictionary entry: a word and its non-negative weight. */
export interface Term {
  readonly word: Word;
  readonly weight: Weight;
}

/** Comparator with Array.sort semantics: <0 means a before b. */
export type TermComparator = (a: Term, b: Term) => number;
