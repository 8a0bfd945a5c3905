import type { Term, Word } from "../types.js";
import type { NodeId, ReadonlyTrie } from "../trie.js";
import { byWeight, createTerm } from "../term.js";
import { ArrayHeap } from "./arrayHeap.js";

type FrontierEntry = {
  id: NodeId;
  /** Characters from the root to this node. */
  path: string;
  bound: number;
};

export interface SearchResult {
  /** Best terms first. */
  terms: Term[];
  /** Nodes popped from the frontier. */
  expanded: number;
  /** True when the search stopped early on the bound check rather than by exhausting the frontier. */
  pruned: boolean;
}

// Highest bound first; equal bounds come out in path order, which makes the
// traversal a lexicographic preorder within each bound level.
function frontierFirst(a: FrontierEntry, b: FrontierEntry): boolean {
  return a.bound > b.bound || (a.bound === b.bound && a.path < b.path);
}

// Worst candidate on top: lowest weight, then lexicographically greatest word.
function candidateWorse(a: Term, b: Term): boolean {
  const c = byWeight(a, b);
  return c < 0 || (c === 0 && a.word > b.word);
}

/**
 * A frontier node can no longer contribute once every word below it would lose to
 * the weakest held candidate: its bound is lower, or equal while its path already
 * sorts after that candidate's word (all words below start with the path).
 */
function cannotImprove(entry: FrontierEntry, worst: Term): boolean {
  return entry.bound < worst.weight || (entry.bound === worst.weight && entry.path > worst.word);
}

/**
 * Best-first branch-and-bound top-k over a weighted trie.
 *
 * Nodes are expanded in order of their subtree bound. The k best terminal nodes seen
 * so far sit in a bounded min-heap; once that heap is full and the best remaining
 * bound cannot beat its weakest member, no unexplored subtree can change the answer.
 *
 * Ranking is weight descending, ties broken by ascending word.
 */
export function searchTopMatches(trie: ReadonlyTrie, prefix: string, k: number): SearchResult {
  const empty: SearchResult = { terms: [], expanded: 0, pruned: false };
  if (k <= 0) return empty;

  const start = trie.locate(prefix);
  if (start === undefined) return empty;

  const frontier = new ArrayHeap<FrontierEntry>(frontierFirst);
  frontier.push({ id: start, path: prefix, bound: trie.node(start).subtreeBestWeight });

  const candidates = new ArrayHeap<Term>(candidateWorse);
  let expanded = 0;
  let pruned = false;

  for (let next = frontier.pop(); next !== undefined; next = frontier.pop()) {
    expanded++;
    const node = trie.node(next.id);

    if (node.terminal && node.word !== undefined) {
      candidates.push(createTerm(node.word, node.weight));
      if (candidates.size() > k) candidates.pop();
    }

    for (const [ch, childId] of node.children) {
      frontier.push({ id: childId, path: next.path + ch, bound: trie.node(childId).subtreeBestWeight });
    }

    const best = frontier.peek();
    const worst = candidates.peek();
    if (best !== undefined && worst !== undefined && candidates.size() === k && cannotImprove(best, worst)) {
      pruned = true;
      break;
    }
  }

  const terms: Term[] = [];
  for (let t = candidates.pop(); t !== undefined; t = candidates.pop()) terms.push(t);
  terms.reverse();

  return { terms, expanded, pruned };
}

/**
 * Single best completion by linear descent: from the prefix node, follow the child whose
 * bound equals the current bound until a terminal node carrying that weight is reached.
 *
 * Among equally bounded children the smallest character wins, so this agrees with
 * `searchTopMatches(trie, prefix, 1)`. A stale bound can leave the descent with no
 * such child; the bounded search answers in that case.
 */
export function searchTopMatch(trie: ReadonlyTrie, prefix: string): Word | undefined {
  let id = trie.locate(prefix);
  if (id === undefined) return undefined;

  while (true) {
    const node = trie.node(id);
    const bound = node.subtreeBestWeight;
    if (node.terminal && node.weight === bound) return node.word;

    let chosen: { ch: string; id: NodeId } | undefined;
    for (const [ch, childId] of node.children) {
      if (trie.node(childId).subtreeBestWeight !== bound) continue;
      if (!chosen || ch < chosen.ch) chosen = { ch, id: childId };
    }
    if (!chosen) break;
    id = chosen.id;
  }

  return searchTopMatches(trie, prefix, 1).terms[0]?.word;
}
