import type { Term, Weight, Word } from "../types.js";
import type { Autocompleter } from "../autocompleter.js";
import { byRank, validateTerms } from "../term.js";
import { requireLimit, requireString } from "./arguments.js";

/**
 * Scan-and-sort over every term on each query. Linear per query; kept as the
 * reference the indexed backends are checked against.
 */
export class BruteForceAutocompleter implements Autocompleter {
  private readonly terms: Term[];
  private readonly byWord = new Map<Word, Weight>();

  constructor(terms: Iterable<Term>) {
    this.terms = validateTerms(terms);
    for (const t of this.terms) this.byWord.set(t.word, t.weight);
  }

  get size(): number {
    return this.terms.length;
  }

  topMatches(prefix: string, k: number): Word[] {
    return this.rankedMatches(prefix, k).map((t) => t.word);
  }

  rankedMatches(prefix: string, k: number): Term[] {
    requireString(prefix, "prefix");
    requireLimit(k);
    if (k === 0) return [];
    return this.terms
      .filter((t) => t.word.startsWith(prefix))
      .sort(byRank)
      .slice(0, k);
  }

  topMatch(prefix: string): Word {
    return this.rankedMatches(prefix, 1)[0]?.word ?? "";
  }

  weightOf(word: Word): Weight {
    return this.byWord.get(requireString(word, "word")) ?? 0;
  }
}
