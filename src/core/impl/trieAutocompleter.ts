import type { Term, Weight, Word } from "../types.js";
import type { Autocompleter } from "../autocompleter.js";
import type { ReadonlyTrie } from "../trie.js";
import { validateTerms } from "../term.js";
import { MemoryTrie } from "./memoryTrie.js";
import { searchTopMatch, searchTopMatches, type SearchResult } from "./bestFirstSearch.js";
import { requireLimit, requireString } from "./arguments.js";

/**
 * Trie backend. The trie is built once in the constructor and only ever reached through
 * its read-only view afterwards, so concurrent queries see a fixed snapshot.
 */
export class TrieAutocompleter implements Autocompleter {
  readonly trie: ReadonlyTrie;

  constructor(terms: Iterable<Term>) {
    const trie = new MemoryTrie();
    for (const t of validateTerms(terms)) trie.insert(t.word, t.weight);
    this.trie = trie;
  }

  get size(): number {
    return this.trie.size;
  }

  topMatches(prefix: string, k: number): Word[] {
    return this.rankedMatches(prefix, k).map((t) => t.word);
  }

  rankedMatches(prefix: string, k: number): Term[] {
    return this.search(prefix, k).terms;
  }

  /** The full search result, with expansion statistics. */
  search(prefix: string, k: number): SearchResult {
    return searchTopMatches(this.trie, requireString(prefix, "prefix"), requireLimit(k));
  }

  topMatch(prefix: string): Word {
    return searchTopMatch(this.trie, requireString(prefix, "prefix")) ?? "";
  }

  weightOf(word: Word): Weight {
    return this.trie.weightOf(requireString(word, "word"));
  }
}
