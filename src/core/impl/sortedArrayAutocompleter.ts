import type { Term, TermComparator, Weight, Word } from "../types.js";
import type { Autocompleter } from "../autocompleter.js";
import { byPrefix, byRank, byWord, createTerm, validateTerms } from "../term.js";
import { MinHeapTopKSelector } from "./minHeapTopK.js";
import { requireLimit, requireString } from "./arguments.js";

/**
 * Index of the first element of `a` that `comparator` considers equal to `key`, or -1.
 *
 * `a` must be sorted consistently with `comparator`. Uses at most ceil(log2 n) + 1
 * comparisons.
 */
export function firstIndexOf(a: readonly Term[], key: Term, comparator: TermComparator): number {
  // invariant: a[lo] < key (lo = -1 is a virtual -inf), a[hi] >= key (hi = n is virtual +inf)
  let lo = -1;
  let hi = a.length;
  while (hi - lo > 1) {
    const mid = (lo + hi) >>> 1;
    if (comparator(a[mid]!, key) < 0) lo = mid;
    else hi = mid;
  }
  const found = a[hi];
  return found !== undefined && comparator(found, key) === 0 ? hi : -1;
}

/** Index of the last element of `a` equal to `key` under `comparator`, or -1. */
export function lastIndexOf(a: readonly Term[], key: Term, comparator: TermComparator): number {
  // invariant: a[lo] <= key, a[hi] > key
  let lo = -1;
  let hi = a.length;
  while (hi - lo > 1) {
    const mid = (lo + hi) >>> 1;
    if (comparator(a[mid]!, key) <= 0) lo = mid;
    else hi = mid;
  }
  const found = a[lo];
  return found !== undefined && comparator(found, key) === 0 ? lo : -1;
}

/**
 * Sorted-array backend: terms kept in natural (word) order, the prefix range located
 * with two boundary binary searches, then a bounded heap picks the top k inside it.
 */
export class SortedArrayAutocompleter implements Autocompleter {
  private readonly terms: Term[];
  private readonly selector = new MinHeapTopKSelector<Term>();

  constructor(terms: Iterable<Term>) {
    this.terms = validateTerms(terms).sort(byWord);
  }

  get size(): number {
    return this.terms.length;
  }

  /** Inclusive `[first, last]` index range of words starting with `prefix`, or undefined. */
  prefixRange(prefix: string): [number, number] | undefined {
    const key = createTerm(prefix, 0);
    const cmp = byPrefix(prefix.length);
    const first = firstIndexOf(this.terms, key, cmp);
    if (first < 0) return undefined;
    return [first, lastIndexOf(this.terms, key, cmp)];
  }

  topMatches(prefix: string, k: number): Word[] {
    return this.rankedMatches(prefix, k).map((t) => t.word);
  }

  rankedMatches(prefix: string, k: number): Term[] {
    const range = this.prefixRange(requireString(prefix, "prefix"));
    if (requireLimit(k) === 0 || !range) return [];
    return this.selector.topK(this.slice(range), k, byRank);
  }

  topMatch(prefix: string): Word {
    const range = this.prefixRange(requireString(prefix, "prefix"));
    if (!range) return "";

    // strict > keeps the first (lexicographically smallest) of equal weights
    let best: Term | undefined;
    for (const t of this.slice(range)) {
      if (!best || t.weight > best.weight) best = t;
    }
    return best?.word ?? "";
  }

  weightOf(word: Word): Weight {
    const i = firstIndexOf(this.terms, createTerm(requireString(word, "word"), 0), byWord);
    return i < 0 ? 0 : (this.terms[i]?.weight ?? 0);
  }

  private *slice([first, last]: [number, number]): Iterable<Term> {
    for (let i = first; i <= last; i++) {
      const t = this.terms[i];
      if (t) yield t;
    }
  }
}
