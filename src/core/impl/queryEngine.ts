import type { Term, Weight, Word } from "../types.js";
import type { Autocompleter } from "../autocompleter.js";
import { validateTerms } from "../term.js";
import { InvalidArgumentError } from "../errors.js";
import { TrieAutocompleter } from "./trieAutocompleter.js";
import { SortedArrayAutocompleter } from "./sortedArrayAutocompleter.js";
import { BruteForceAutocompleter } from "./bruteForceAutocompleter.js";
import { requireLimit, requireString } from "./arguments.js";

export const BACKENDS = ["trie", "sorted-array", "brute-force"] as const;
export type BackendKind = (typeof BACKENDS)[number];

export function isBackendKind(v: unknown): v is BackendKind {
  return typeof v === "string" && (BACKENDS as readonly string[]).includes(v);
}

export interface QueryEngineOptions {
  /** Backend answering queries. Defaults to "trie". */
  backend?: BackendKind;
}

export interface EquivalenceReport {
  prefix: string;
  k: number;
  primary: Term[];
  alternate: Term[];
  /** Both backends returned the same weight sequence. */
  equivalent: boolean;
}

function createBackend(kind: BackendKind, terms: readonly Term[]): Autocompleter {
  switch (kind) {
    case "trie":
      return new TrieAutocompleter(terms);
    case "sorted-array":
      return new SortedArrayAutocompleter(terms);
    case "brute-force":
      return new BruteForceAutocompleter(terms);
  }
}

/**
 * Façade over the completion backends.
 *
 * Validates the dictionary once, answers queries from the primary backend and keeps a
 * sorted-array backend (built on first use) to cross-check the primary's answers.
 */
export class QueryEngine implements Autocompleter {
  readonly backend: BackendKind;
  private readonly terms: readonly Term[];
  private readonly primary: Autocompleter;
  private alternate: Autocompleter | undefined;

  constructor(terms: Iterable<Term>, options: QueryEngineOptions = {}) {
    const backend = options.backend ?? "trie";
    if (!isBackendKind(backend)) throw new InvalidArgumentError(`unknown backend "${String(backend)}"`);

    this.backend = backend;
    this.terms = validateTerms(terms);
    this.primary = createBackend(backend, this.terms);
  }

  get size(): number {
    return this.primary.size;
  }

  topMatches(prefix: string, k: number): Word[] {
    return this.primary.topMatches(requireString(prefix, "prefix"), requireLimit(k));
  }

  rankedMatches(prefix: string, k: number): Term[] {
    return this.primary.rankedMatches(requireString(prefix, "prefix"), requireLimit(k));
  }

  topMatch(prefix: string): Word {
    return this.primary.topMatch(requireString(prefix, "prefix"));
  }

  weightOf(word: Word): Weight {
    return this.primary.weightOf(requireString(word, "word"));
  }

  /**
   * Runs the query on both the primary and the sorted-array backend and compares the
   * weights they return.
   */
  verify(prefix: string, k: number): EquivalenceReport {
    const primary = this.rankedMatches(prefix, k);
    this.alternate ??= this.backend === "sorted-array" ? this.primary : new SortedArrayAutocompleter(this.terms);
    const alternate = this.alternate.rankedMatches(prefix, k);

    const equivalent = primary.length === alternate.length && primary.every((t, i) => t.weight === alternate[i]?.weight);
    return { prefix, k, primary, alternate, equivalent };
  }
}
