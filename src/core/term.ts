import type { Term, TermComparator, Weight, Word } from "./types.js";
import { DuplicateWordError, InvalidArgumentError, NegativeWeightError, NullArgumentError } from "./errors.js";

export function createTerm(word: Word, weight: Weight): Term {
  return Object.freeze({ word, weight });
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Natural order: lexicographic by word (UTF-16 code units, same as `<`). */
export const byWord: TermComparator = (a, b) => compareStrings(a.word, b.word);

/** Ascending weight. */
export const byWeight: TermComparator = (a, b) => a.weight - b.weight;

/**
 * Result order: heaviest first, ties broken by ascending word.
 * Every backend ranks with this so their outputs are interchangeable.
 */
export const byRank: TermComparator = (a, b) => b.weight - a.weight || compareStrings(a.word, b.word);

/**
 * Prefix-equivalence order. Terms compare equal iff their first `length` characters
 * match; otherwise they are ordered by those leading characters.
 *
 * A `byWord`-sorted array stays sorted under this order for any `length`, which is
 * what lets the sorted-array backend binary search for a prefix range.
 */
export function byPrefix(length: number): TermComparator {
  if (!Number.isInteger(length) || length < 0) {
    throw new InvalidArgumentError(`prefix length must be a non-negative integer, got ${length}`);
  }
  return (a, b) => compareStrings(a.word.slice(0, length), b.word.slice(0, length));
}

/**
 * Checks a single weight. Throws NegativeWeight for w < 0 and InvalidArgument for
 * NaN / infinities.
 */
export function checkWeight(weight: Weight, word?: Word): void {
  if (typeof weight !== "number" || !Number.isFinite(weight)) {
    throw new InvalidArgumentError(
      word === undefined ? `weight must be a finite number` : `weight for "${word}" must be a finite number`,
    );
  }
  if (weight < 0) throw new NegativeWeightError(weight, word);
}

/**
 * Validates a whole dictionary before any backend is built from it.
 *
 * Input arrives from JS callers and JSON bodies too, so nulls are checked at run time
 * even though the signature does not admit them.
 */
export function validateTerms(terms: Iterable<Term> | null | undefined): Term[] {
  if (terms == null) throw new NullArgumentError("terms");

  const seen = new Set<Word>();
  const out: Term[] = [];
  for (const t of terms) {
    if (t == null) throw new NullArgumentError("term");
    if (t.word == null) throw new NullArgumentError("word");
    if (typeof t.word !== "string") throw new InvalidArgumentError("word must be a string");
    if (t.word.length === 0) throw new InvalidArgumentError("word must be non-empty");
    checkWeight(t.weight, t.word);
    if (seen.has(t.word)) throw new DuplicateWordError(t.word);
    seen.add(t.word);
    out.push(createTerm(t.word, t.weight));
  }
  return out;
}

/** Builds terms from parallel word/weight arrays, `words[i]` weighing `weights[i]`. */
export function zipTerms(
  words: readonly Word[] | null | undefined,
  weights: readonly Weight[] | null | undefined,
): Term[] {
  if (words == null) throw new NullArgumentError("words");
  if (weights == null) throw new NullArgumentError("weights");
  if (words.length !== weights.length) {
    throw new InvalidArgumentError(`words and weights differ in length (${words.length} vs ${weights.length})`);
  }
  return words.map((word, i) => createTerm(word, weights[i] ?? Number.NaN));
}
