import { describe, expect, it } from "vitest";
import { MemoryTrie } from "../memoryTrie.js";
import type { NodeId, ReadonlyTrie } from "../../trie.js";
import { InvalidArgumentError, NegativeWeightError, NullArgumentError } from "../../errors.js";
import { SAMPLE, mulberry32, randomDictionary } from "./fixtures.js";

function build(terms: Array<{ word: string; weight: number }>): MemoryTrie {
  const trie = new MemoryTrie();
  for (const t of terms) trie.insert(t.word, t.weight);
  return trie;
}

function bound(trie: ReadonlyTrie, prefix: string): number | undefined {
  const id = trie.locate(prefix);
  return id === undefined ? undefined : trie.node(id).subtreeBestWeight;
}

/** Max terminal weight in the subtree, computed the slow way. */
function exactBest(trie: ReadonlyTrie, id: NodeId): number {
  const n = trie.node(id);
  let best = n.terminal ? n.weight : 0;
  for (const childId of n.children.values()) best = Math.max(best, exactBest(trie, childId));
  return best;
}

function forEachNode(trie: ReadonlyTrie, fn: (id: NodeId) => void, id: NodeId = trie.root): void {
  fn(id);
  for (const childId of trie.children(id).values()) forEachNode(trie, fn, childId);
}

describe("MemoryTrie", () => {
  it("stores one path per word with subtree bounds", () => {
    const trie = build(SAMPLE);

    expect(trie.size).toBe(4);
    // root + a,ai,air + b + ba,bat + be,bel,bell + bo,boy
    expect(trie.nodeCount).toBe(12);
    expect(bound(trie, "")).toBe(4);
    expect(bound(trie, "a")).toBe(3);
    expect(bound(trie, "b")).toBe(4);
    expect(bound(trie, "ba")).toBe(2);
    expect(bound(trie, "bo")).toBe(1);
    expect(bound(trie, "c")).toBeUndefined();
  });

  it("keeps the root a non-terminal placeholder", () => {
    const trie = build(SAMPLE);
    const root = trie.node(trie.root);
    expect(root.terminal).toBe(false);
    expect(root.parent).toBeNull();
    expect(root.character).toBe("");
  });

  it("marks terminal nodes with their word and weight", () => {
    const trie = build(SAMPLE);
    const bell = trie.node(trie.locate("bell") ?? -1);
    expect(bell.terminal).toBe(true);
    expect(bell.word).toBe("bell");
    expect(bell.weight).toBe(4);

    const bel = trie.node(trie.locate("bel") ?? -1);
    expect(bel.terminal).toBe(false);
    expect(bel.word).toBeUndefined();
  });

  it("rebuilds paths through parent links", () => {
    const trie = build(SAMPLE);
    const id = trie.locate("bel");
    expect(id).toBeDefined();
    expect(trie.pathOf(id ?? trie.root)).toBe("bel");
    expect(trie.pathOf(trie.root)).toBe("");

    const parent = trie.node(id ?? trie.root).parent;
    expect(parent).toBe(trie.locate("be"));
  });

  it("reports weights of exact words only", () => {
    const trie = build(SAMPLE);
    expect(trie.weightOf("boy")).toBe(1);
    expect(trie.weightOf("bel")).toBe(0);
    expect(trie.weightOf("cat")).toBe(0);
    expect(trie.weightOf("bells")).toBe(0);
  });

  it("raises bounds on every ancestor when a heavier word passes through", () => {
    const trie = build(SAMPLE);
    trie.insert("boyish", 10);
    expect(bound(trie, "")).toBe(10);
    expect(bound(trie, "b")).toBe(10);
    expect(bound(trie, "bo")).toBe(10);
    expect(bound(trie, "boy")).toBe(10);
    expect(bound(trie, "be")).toBe(4);
  });

  it("updates the weight of an existing word without adding nodes", () => {
    const trie = build(SAMPLE);
    const nodes = trie.nodeCount;

    trie.insert("boy", 7);
    expect(trie.nodeCount).toBe(nodes);
    expect(trie.size).toBe(4);
    expect(trie.weightOf("boy")).toBe(7);
    expect(bound(trie, "b")).toBe(7);
    expect(bound(trie, "")).toBe(7);
  });

  it("leaves bounds stale-high when a weight is lowered", () => {
    const trie = build(SAMPLE);
    trie.insert("bell", 0.5);
    expect(trie.weightOf("bell")).toBe(0.5);
    expect(bound(trie, "b")).toBe(4);
    expect(bound(trie, "bell")).toBe(4);
  });

  it("accepts a word that is a prefix of an existing one", () => {
    const trie = build(SAMPLE);
    trie.insert("be", 9);
    expect(trie.size).toBe(5);
    expect(trie.weightOf("be")).toBe(9);
    expect(bound(trie, "be")).toBe(9);
    expect(bound(trie, "bel")).toBe(4);
  });

  it("rejects invalid input", () => {
    const trie = new MemoryTrie();
    expect(() => trie.insert("x", -1)).toThrow(NegativeWeightError);
    expect(() => trie.insert("x", Number.NaN)).toThrow(InvalidArgumentError);
    expect(() => trie.insert("", 1)).toThrow(InvalidArgumentError);
    const absent: string = JSON.parse("null");
    expect(() => trie.insert(absent, 1)).toThrow(NullArgumentError);
    expect(trie.size).toBe(0);
  });

  it("maintains the bound invariant on random dictionaries", () => {
    for (let seed = 1; seed <= 20; seed++) {
      const trie = build(randomDictionary(mulberry32(seed), 40));
      forEachNode(trie, (id) => {
        const n = trie.node(id);
        expect(n.subtreeBestWeight).toBe(exactBest(trie, id));
        for (const childId of n.children.values()) {
          expect(n.subtreeBestWeight).toBeGreaterThanOrEqual(trie.node(childId).subtreeBestWeight);
        }
      });
    }
  });
});
