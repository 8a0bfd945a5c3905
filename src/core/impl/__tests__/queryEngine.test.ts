import { describe, expect, it } from "vitest";
import { BACKENDS, QueryEngine } from "../queryEngine.js";
import { TrieAutocompleter } from "../trieAutocompleter.js";
import { MemoryTrie } from "../memoryTrie.js";
import { searchTopMatches } from "../bestFirstSearch.js";
import { createTerm } from "../../term.js";
import { DuplicateWordError, InvalidArgumentError, NegativeWeightError, NullArgumentError } from "../../errors.js";
import { SAMPLE, mulberry32, randomDictionary, randomInt, randomWord } from "./fixtures.js";

describe.each(BACKENDS)("QueryEngine (%s)", (backend) => {
  const engine = new QueryEngine(SAMPLE, { backend });

  it("completes prefixes by descending weight", () => {
    expect(engine.backend).toBe(backend);
    expect(engine.size).toBe(4);
    expect(engine.topMatches("b", 2)).toEqual(["bell", "bat"]);
    expect(engine.topMatches("a", 2)).toEqual(["air"]);
    expect(engine.topMatches("", 4)).toEqual(["bell", "air", "bat", "boy"]);
    expect(engine.rankedMatches("b", 1)).toEqual([createTerm("bell", 4)]);
  });

  it("returns empty results for k = 0 and unknown prefixes", () => {
    expect(engine.topMatches("b", 0)).toEqual([]);
    expect(engine.topMatches("c", 3)).toEqual([]);
    expect(engine.topMatch("c")).toBe("");
  });

  it("answers topMatch and weightOf", () => {
    expect(engine.topMatch("b")).toBe("bell");
    expect(engine.weightOf("boy")).toBe(1);
    expect(engine.weightOf("cat")).toBe(0);
  });

  it("rejects absent arguments and bad limits", () => {
    const absent: string = JSON.parse("null");
    expect(() => engine.topMatches(absent, 1)).toThrow(NullArgumentError);
    expect(() => engine.topMatch(absent)).toThrow(NullArgumentError);
    expect(() => engine.weightOf(absent)).toThrow(NullArgumentError);
    expect(() => engine.topMatches("b", -1)).toThrow(InvalidArgumentError);
    expect(() => engine.topMatches("b", 1.5)).toThrow(InvalidArgumentError);
  });

  it("validates the dictionary at construction", () => {
    expect(() => new QueryEngine([createTerm("a", 1), createTerm("a", 2)], { backend })).toThrow(DuplicateWordError);
    expect(() => new QueryEngine([createTerm("a", -1)], { backend })).toThrow(NegativeWeightError);
    const absent: typeof SAMPLE = JSON.parse("null");
    expect(() => new QueryEngine(absent, { backend })).toThrow(NullArgumentError);
  });

  it("serves an empty dictionary", () => {
    const empty = new QueryEngine([], { backend });
    expect(empty.size).toBe(0);
    expect(empty.topMatches("", 5)).toEqual([]);
    expect(empty.topMatch("")).toBe("");
  });
});

describe("QueryEngine", () => {
  it("defaults to the trie backend", () => {
    expect(new QueryEngine(SAMPLE).backend).toBe("trie");
  });

  it("rejects an unknown backend", () => {
    const options: { backend: "trie" } = JSON.parse('{"backend":"radix"}');
    expect(() => new QueryEngine(SAMPLE, options)).toThrow(InvalidArgumentError);
  });

  it("cross-checks the primary backend against the sorted array", () => {
    const engine = new QueryEngine(SAMPLE);
    expect(engine.verify("b", 2)).toEqual({
      prefix: "b",
      k: 2,
      primary: [createTerm("bell", 4), createTerm("bat", 2)],
      alternate: [createTerm("bell", 4), createTerm("bat", 2)],
      equivalent: true,
    });
  });

  it("finds every backend equivalent on random dictionaries", () => {
    for (let seed = 1; seed <= 30; seed++) {
      const rand = mulberry32(seed * 7919);
      const dict = randomDictionary(rand, 50, "abcd", 4, 9);
      const engines = BACKENDS.map((backend) => new QueryEngine(dict, { backend }));

      for (let q = 0; q < 10; q++) {
        const prefix = randomWord(rand, "abcd", 2);
        const k = randomInt(rand, 10);
        const reference = engines[2]?.rankedMatches(prefix, k);
        for (const engine of engines) {
          expect(engine.verify(prefix, k).equivalent).toBe(true);
          expect(engine.rankedMatches(prefix, k)).toEqual(reference);
          expect(engine.topMatch(prefix)).toBe(engine.topMatches(prefix, 1)[0] ?? "");
        }
      }
    }
  });
});

describe("TrieAutocompleter", () => {
  it("returns words that all start with the prefix, min(k, matches) of them", () => {
    const rand = mulberry32(42);
    const dict = randomDictionary(rand, 80);
    const ac = new TrieAutocompleter(dict);

    for (const prefix of ["", "a", "ab", "ca", "bbb"]) {
      const matching = dict.filter((t) => t.word.startsWith(prefix)).length;
      for (const k of [0, 1, 3, 100]) {
        const out = ac.rankedMatches(prefix, k);
        expect(out).toHaveLength(Math.min(k, matching));
        for (const t of out) expect(t.word.startsWith(prefix)).toBe(true);
        for (let i = 1; i < out.length; i++) expect(out[i - 1]!.weight).toBeGreaterThanOrEqual(out[i]!.weight);
      }
    }
  });

  it("exposes search statistics", () => {
    const ac = new TrieAutocompleter(SAMPLE);
    const r = ac.search("b", 2);
    expect(r.terms.map((t) => t.word)).toEqual(["bell", "bat"]);
    expect(r.pruned).toBe(true);
  });
});

describe("re-insertion", () => {
  function build(): MemoryTrie {
    const trie = new MemoryTrie();
    for (const t of SAMPLE) trie.insert(t.word, t.weight);
    return trie;
  }

  const ranked = (trie: MemoryTrie, prefix: string, k: number) =>
    searchTopMatches(trie, prefix, k).terms.map((t) => t.word);

  it("is idempotent for an unchanged weight", () => {
    const trie = build();
    const before = ranked(trie, "", 4);
    trie.insert("bat", 2);
    expect(ranked(trie, "", 4)).toEqual(before);
    expect(trie.size).toBe(4);
  });

  it("only moves a heavier word earlier", () => {
    const trie = build();
    expect(ranked(trie, "b", 3)).toEqual(["bell", "bat", "boy"]);

    trie.insert("boy", 3);
    expect(ranked(trie, "b", 3)).toEqual(["bell", "boy", "bat"]);

    trie.insert("boy", 9);
    expect(ranked(trie, "b", 3)).toEqual(["boy", "bell", "bat"]);
  });
});
